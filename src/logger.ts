export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

export function getLogLevel(): LogLevel {
	return threshold;
}

// All output goes to stderr; stdout belongs to whoever embeds the library.
function emit(level: LogLevel, args: unknown[]): void {
	if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) return;
	console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
	info: (...args: unknown[]) => emit("info", args),
	warn: (...args: unknown[]) => emit("warn", args),
	error: (...args: unknown[]) => emit("error", args),
	debug: (...args: unknown[]) => emit("debug", args),
};
