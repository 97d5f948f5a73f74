export type ParseErrorCode = "UNKNOWN_SERIES" | "MALFORMED_DOCNUMBER";

export class PubIdParseError extends Error {
	constructor(
		public readonly code: ParseErrorCode,
		message: string,
		public readonly input: string,
		public readonly suggestion?: string,
	) {
		super(message);
		this.name = "PubIdParseError";
	}
}

export class InvalidModelError extends Error {
	readonly code = "INVALID_MODEL" as const;

	constructor(public readonly issues: string[]) {
		super(`Invalid PubID: ${issues.join("; ")}`);
		this.name = "InvalidModelError";
	}
}

export class RegistryError extends Error {
	readonly code = "INVALID_REGISTRY" as const;

	constructor(message: string) {
		super(message);
		this.name = "RegistryError";
	}
}
