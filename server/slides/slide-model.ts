import type { ZodError } from "zod";
import { AppError } from "../errors";
import {
	type ProjectDocument,
	type Slide,
	type SlideList,
	projectDocumentSchema,
	slideInputSchema,
} from "./slide-types";

function describeIssues(error: ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ");
}

function freezeSlide(imagePath: string, cursorX: number, cursorY: number): Slide {
	return Object.freeze({ imagePath, cursorX, cursorY });
}

/**
 * Ordered slide list of one project. Insertion order is presentation
 * order; slides are immutable once added.
 */
export class SlideModel implements SlideList {
	private slides: readonly Slide[] = Object.freeze([]);
	private view: SlideList | null = null;

	static createEmpty(): SlideModel {
		return new SlideModel();
	}

	get size(): number {
		return this.slides.length;
	}

	/** Append a slide. Throws INVALID_SLIDE_DATA without mutating on bad input. */
	addSlide(imagePath: string, x: number, y: number): Slide {
		const parsed = slideInputSchema.safeParse({
			imagePath,
			cursorX: x,
			cursorY: y,
		});
		if (!parsed.success) {
			throw new AppError(
				"INVALID_SLIDE_DATA",
				`Invalid slide data: ${describeIssues(parsed.error)}`,
				{ operation: "addSlide" },
			);
		}
		if (this.hasSlide(imagePath)) {
			throw new AppError(
				"INVALID_SLIDE_DATA",
				`Slide already recorded: ${imagePath}`,
				{ operation: "addSlide" },
			);
		}

		const slide = freezeSlide(
			parsed.data.imagePath,
			parsed.data.cursorX,
			parsed.data.cursorY,
		);
		this.slides = Object.freeze([...this.slides, slide]);
		return slide;
	}

	slideAt(index: number): Slide | undefined {
		return this.slides[index];
	}

	hasSlide(imagePath: string): boolean {
		return this.slides.some((slide) => slide.imagePath === imagePath);
	}

	getSlides(): readonly Slide[] {
		return this.slides;
	}

	toDocument(): ProjectDocument {
		return {
			slides: this.slides.map((slide) => ({
				path: slide.imagePath,
				x: slide.cursorX,
				y: slide.cursorY,
			})),
		};
	}

	/**
	 * Replace the whole sequence from a project document, given as JSON text
	 * or as an already-parsed value. All-or-nothing.
	 */
	fromDocument(doc: unknown): void {
		let value = doc;
		if (typeof doc === "string") {
			try {
				value = JSON.parse(doc) as unknown;
			} catch (error) {
				throw new AppError(
					"MALFORMED_PROJECT_DOCUMENT",
					"Project document is not valid JSON",
					{ operation: "fromDocument" },
					error,
				);
			}
		}

		const parsed = projectDocumentSchema.safeParse(value);
		if (!parsed.success) {
			throw new AppError(
				"MALFORMED_PROJECT_DOCUMENT",
				`Malformed project document: ${describeIssues(parsed.error)}`,
				{ operation: "fromDocument" },
			);
		}

		this.slides = Object.freeze(
			parsed.data.slides.map((entry) => freezeSlide(entry.path, entry.x, entry.y)),
		);
	}

	/** Image paths in order, as of this call. Re-iterable. */
	slidePaths(): Iterable<string> {
		const snapshot = this.slides;
		return {
			*[Symbol.iterator]() {
				for (const slide of snapshot) {
					yield slide.imagePath;
				}
			},
		};
	}

	/** A live view of this model without the mutating methods. */
	asReadOnly(): SlideList {
		if (!this.view) {
			const model = this;
			this.view = Object.freeze({
				get size() {
					return model.size;
				},
				slideAt: (index: number) => model.slideAt(index),
				hasSlide: (imagePath: string) => model.hasSlide(imagePath),
				getSlides: () => model.getSlides(),
				slidePaths: () => model.slidePaths(),
				toDocument: () => model.toDocument(),
			});
		}
		return this.view;
	}
}
