import { z } from "zod";
import { DEFAULT_TRIGGER_KEYS } from "./capture/capture-session";
import type { TriggerKeys } from "./capture/capture-types";
import { DEFAULT_DOCUMENT_NAME } from "./projects/project-controller";

// `PORT=` in a shell or .env file means "not set", not zero.
function unsetWhenEmpty<T extends z.ZodTypeAny>(schema: T) {
	return z.preprocess((value) => (value === "" ? undefined : value), schema);
}

const envSchema = z.object({
	PORT: unsetWhenEmpty(z.coerce.number().int().min(0).max(65535).default(3000)),
	HOST: unsetWhenEmpty(z.string().min(1).default("127.0.0.1")),
	DOCUMENT_NAME: unsetWhenEmpty(z.string().min(1).default(DEFAULT_DOCUMENT_NAME)),
	CAPTURE_KEY: unsetWhenEmpty(
		z.string().min(1).default(DEFAULT_TRIGGER_KEYS.capture),
	),
	EXIT_KEY: unsetWhenEmpty(z.string().min(1).default(DEFAULT_TRIGGER_KEYS.exit)),
	CAPTURE_SOURCE: unsetWhenEmpty(z.string().min(1).optional()),
});

export interface AppConfig {
	port: number;
	host: string;
	documentName: string;
	triggerKeys: TriggerKeys;
	captureSource?: string;
}

/** Read configuration from environment variables. Throws on invalid values. */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): AppConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid configuration: ${details}`);
	}
	const values = parsed.data;
	if (values.CAPTURE_KEY.toLowerCase() === values.EXIT_KEY.toLowerCase()) {
		throw new Error("Invalid configuration: CAPTURE_KEY and EXIT_KEY must differ");
	}
	return {
		port: values.PORT,
		host: values.HOST,
		documentName: values.DOCUMENT_NAME,
		triggerKeys: { capture: values.CAPTURE_KEY, exit: values.EXIT_KEY },
		captureSource: values.CAPTURE_SOURCE,
	};
}
