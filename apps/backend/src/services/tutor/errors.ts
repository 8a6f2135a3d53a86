import type { ApiIssue } from "@language-tutor/shared";

export class LessonConfigError extends Error {
	readonly code = "VALIDATION_ERROR" as const;

	constructor(
		message: string,
		readonly issues: ApiIssue[] = []
	) {
		super(message);
		this.name = "LessonConfigError";
	}
}

export class SessionNotFoundError extends Error {
	readonly code = "SESSION_NOT_FOUND" as const;

	constructor(readonly sessionId: string) {
		super(`Lesson session ${sessionId} was not found. Start a new lesson to continue.`);
		this.name = "SessionNotFoundError";
	}
}

export class LlmEmptyResponseError extends Error {
	readonly code = "EMPTY_RESPONSE" as const;

	constructor() {
		super("The language model returned an empty reply");
		this.name = "LlmEmptyResponseError";
	}
}
