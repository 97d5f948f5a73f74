import { z } from "zod";
import { LOG_LEVELS, logger } from "./logger.js";

export const ConfigSchema = z.object({
	PUBID_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	PUBID_PARSE_CACHE_SIZE: z.coerce.number().int().nonnegative().default(500),
	PUBID_REGISTRY_PATH: z.string().min(1, "PUBID_REGISTRY_PATH must not be empty").optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = ConfigSchema.safeParse(env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	return result.data;
}
