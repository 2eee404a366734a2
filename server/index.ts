import fastifyWebsocket from "@fastify/websocket";
import Fastify from "fastify";
import { registerProjectRoutes } from "./api/project/routes";
import { loadConfig } from "./config";
import { createEditor } from "./editor";
import { FrameCopyCapture } from "./input/frame-copy-capture";
import { RemoteInput } from "./input/remote-input";
import { NodeFileSystem } from "./store/node-file-system";
import { handleWebSocket } from "./websocket";

async function main() {
	const config = loadConfig();
	const app = Fastify({ logger: true });

	const fileSystem = new NodeFileSystem();
	const input = new RemoteInput();
	const editor = createEditor({
		fileSystem,
		screen: new FrameCopyCapture(fileSystem, {
			sourcePath: config.captureSource,
		}),
		pointer: input,
		keys: input,
		documentName: config.documentName,
		triggerKeys: config.triggerKeys,
	});
	if (!config.captureSource) {
		app.log.warn("CAPTURE_SOURCE is not set: capture triggers will fail");
	}

	// WebSocket support
	await app.register(fastifyWebsocket);

	app.get("/ws", { websocket: true }, (socket, _req) => {
		handleWebSocket(socket, { editor, input });
	});

	await registerProjectRoutes(app, { editor });

	await app.listen({ port: config.port, host: config.host });
	console.log(
		`Slide capture editor running at http://${config.host}:${config.port}`,
	);

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		console.log(`\n[server] Received ${signal}, shutting down...`);
		if (editor.controller.isDirty()) {
			console.warn("[server] Exiting with unsaved changes");
		}
		try {
			editor.capture.exit();
			await app.close();
			process.exit(0);
		} catch (error) {
			console.error("[server] Shutdown failed:", error);
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err) => {
	console.error("Failed to start server:", err);
	process.exit(1);
});
