import type { AppErrorCode } from "../server/errors";
import type { ProjectStatus } from "../server/projects/project-types";

/**
 * Client -> Server WebSocket messages.
 * Key and pointer input are relayed to capture mode; all messages include
 * an optional requestId for correlating error responses.
 */
export type ClientMessage = {
	requestId?: string;
} & (
	| { type: "input:key"; key: string }
	| { type: "input:pointer"; x: number; y: number }
	| { type: "slide:select"; imagePath: string }
);

/**
 * Server -> Client WebSocket messages.
 */
export type ServerMessage =
	| { type: "slide:added"; projectDir: string; imagePath: string; index: number }
	| { type: "slide:selected"; projectDir: string; imagePath: string }
	| {
			type: "project:changed";
			projectDir: string;
			status: ProjectStatus;
			slidePaths: string[];
	  }
	| { type: "capture:mode"; armed: boolean }
	| {
			type: "capture:failed";
			code: AppErrorCode;
			message: string;
			projectDir?: string;
	  }
	| { type: "error"; requestId?: string; code?: string; message: string };
