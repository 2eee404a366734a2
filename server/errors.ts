export type AppErrorCode =
	| "INVALID_SLIDE_DATA"
	| "MALFORMED_PROJECT_DOCUMENT"
	| "PROJECT_NOT_FOUND"
	| "DIRECTORY_UNAVAILABLE"
	| "PERSISTENCE_FAILED"
	| "CAPTURE_FAILED"
	| "NO_ACTIVE_PROJECT"
	| "SAVE_WHILE_CAPTURING"
	| "CAPTURE_MODE_ACTIVE"
	| "SLIDE_NOT_FOUND";

/** Where a failure happened, for the presentation layer to message the user. */
export interface AppErrorContext {
	operation?: string;
	projectDir?: string;
}

/**
 * Application-level error with a user-facing message.
 * Every editor failure is recoverable: the component that raises it has
 * left its state as it was before the call.
 */
export class AppError extends Error {
	readonly code: AppErrorCode;
	readonly context: AppErrorContext;
	readonly cause?: unknown;

	constructor(
		code: AppErrorCode,
		message: string,
		context: AppErrorContext = {},
		cause?: unknown,
	) {
		super(message);
		this.name = "AppError";
		this.code = code;
		this.context = context;
		this.cause = cause;
	}

	/** Copy of this error with extra context merged in. */
	withContext(context: AppErrorContext): AppError {
		return new AppError(
			this.code,
			this.message,
			{ ...this.context, ...context },
			this.cause,
		);
	}
}

export function isAppError(error: unknown): error is AppError {
	return error instanceof AppError;
}

export function toErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
