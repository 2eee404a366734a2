import { z } from "zod";

/** One captured moment: an image plus the cursor position at capture time. */
export interface Slide {
	readonly imagePath: string;
	readonly cursorX: number;
	readonly cursorY: number;
}

/** Read-only access to a slide sequence. */
export interface SlideList {
	readonly size: number;
	slideAt(index: number): Slide | undefined;
	hasSlide(imagePath: string): boolean;
	getSlides(): readonly Slide[];
	slidePaths(): Iterable<string>;
	toDocument(): ProjectDocument;
}

export const slideInputSchema = z.object({
	imagePath: z.string().min(1, "imagePath must be a non-empty string"),
	cursorX: z.number().int(),
	cursorY: z.number().int(),
});

// -- Persisted document (presentation.dahu) --
export const slideEntrySchema = z.object({
	path: z.string().min(1),
	x: z.number().int(),
	y: z.number().int(),
});

export type SlideEntry = z.infer<typeof slideEntrySchema>;

export const projectDocumentSchema = z
	.object({
		slides: z.array(slideEntrySchema),
	})
	.superRefine((doc, ctx) => {
		const seen = new Set<string>();
		doc.slides.forEach((entry, index) => {
			if (seen.has(entry.path)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Duplicate slide path: ${entry.path}`,
					path: ["slides", index, "path"],
				});
			}
			seen.add(entry.path);
		});
	});

export type ProjectDocument = z.infer<typeof projectDocumentSchema>;
