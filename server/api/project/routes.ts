import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { Editor } from "../../editor";
import { type AppErrorCode, isAppError } from "../../errors";

export interface ProjectRoutesDeps {
	editor: Pick<Editor, "controller" | "capture">;
}

const dirBodySchema = z.object({ dir: z.string().min(1) });
const selectBodySchema = z.object({ imagePath: z.string().min(1) });

const STATUS_BY_CODE: Record<AppErrorCode, number> = {
	INVALID_SLIDE_DATA: 400,
	MALFORMED_PROJECT_DOCUMENT: 400,
	PROJECT_NOT_FOUND: 404,
	SLIDE_NOT_FOUND: 404,
	NO_ACTIVE_PROJECT: 409,
	SAVE_WHILE_CAPTURING: 409,
	CAPTURE_MODE_ACTIVE: 409,
	DIRECTORY_UNAVAILABLE: 500,
	PERSISTENCE_FAILED: 500,
	CAPTURE_FAILED: 503,
};

function invalidRequest(reply: FastifyReply, error: z.ZodError): FastifyReply {
	return reply.status(400).send({
		error: {
			code: "INVALID_REQUEST",
			message: error.issues.map((issue) => issue.message).join("; "),
		},
	});
}

/** HTTP intents of the presentation layer: create/open/save, selection, capture mode. */
export async function registerProjectRoutes(
	app: FastifyInstance,
	deps: ProjectRoutesDeps,
): Promise<void> {
	const { controller, capture } = deps.editor;

	app.setErrorHandler((error, request, reply) => {
		if (isAppError(error)) {
			request.log.warn(
				{ code: error.code, context: error.context },
				error.message,
			);
			return reply.status(STATUS_BY_CODE[error.code]).send({
				error: {
					code: error.code,
					message: error.message,
					...error.context,
				},
			});
		}
		request.log.error(error);
		return reply.status(500).send({
			error: { code: "INTERNAL_ERROR", message: "Internal server error" },
		});
	});

	app.get("/api/project", async () => ({
		project: controller.getSnapshot(),
		capture: { armed: capture.isArmed() },
	}));

	app.post("/api/project/create", async (request, reply) => {
		const body = dirBodySchema.safeParse(request.body);
		if (!body.success) {
			return invalidRequest(reply, body.error);
		}
		const snapshot = await controller.createProject(body.data.dir);
		return reply.status(201).send(snapshot);
	});

	app.post("/api/project/open", async (request, reply) => {
		const body = dirBodySchema.safeParse(request.body);
		if (!body.success) {
			return invalidRequest(reply, body.error);
		}
		return controller.openProject(body.data.dir);
	});

	app.post("/api/project/save", async () => controller.saveProject());

	app.post("/api/project/select", async (request, reply) => {
		const body = selectBodySchema.safeParse(request.body);
		if (!body.success) {
			return invalidRequest(reply, body.error);
		}
		return { changed: controller.selectSlide(body.data.imagePath) };
	});

	app.get("/api/project/close-check", async () => controller.requestClose());

	app.post("/api/capture/enter", async () => {
		capture.enter();
		return { armed: capture.isArmed() };
	});

	app.post("/api/capture/exit", async () => {
		capture.exit();
		return { armed: capture.isArmed() };
	});
}
