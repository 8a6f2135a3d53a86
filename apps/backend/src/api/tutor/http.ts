import {
	TutorErrorCodeSchema,
	toApiIssues,
	type ApiFailure,
	type ApiIssue,
	type ApiSuccess,
	type TutorErrorCode
} from "@language-tutor/shared";
import type { FastifyReply } from "fastify";
import { ZodError } from "zod";

const STATUS_BY_CODE: Record<TutorErrorCode, number> = {
	VALIDATION_ERROR: 400,
	SESSION_NOT_FOUND: 404,
	LLM_NOT_CONFIGURED: 503,
	TIMEOUT: 504,
	LLM_REQUEST_FAILED: 502,
	LLM_UNREACHABLE: 502,
	EMPTY_RESPONSE: 502,
	STORAGE_ERROR: 500,
	INTERNAL_ERROR: 500
};

export interface FailureResponse {
	status: number;
	body: ApiFailure;
}

export function successEnvelope<T>(data: T, now: () => Date): ApiSuccess<T> {
	return { success: true, data, timestamp: now().getTime() };
}

export function sendSuccess<T>(reply: FastifyReply, status: number, data: T, now: () => Date): FastifyReply {
	return reply.code(status).send(successEnvelope(data, now));
}

/**
 * Maps a thrown value onto the failure envelope. Errors carrying a known
 * `code` keep it; zod errors become `VALIDATION_ERROR` with their issues.
 */
export function toFailureResponse(error: unknown, now: () => Date): FailureResponse {
	if (error instanceof ZodError) {
		return failure("VALIDATION_ERROR", error.issues[0]?.message ?? "Invalid request", toApiIssues(error), now);
	}

	const code = readErrorCode(error);
	const message = error instanceof Error && error.message ? error.message : "Internal server error";
	return failure(code, message, readIssues(error), now);
}

export function sendFailure(reply: FastifyReply, error: unknown, now: () => Date): FastifyReply {
	const { status, body } = toFailureResponse(error, now);
	return reply.code(status).send(body);
}

function failure(
	code: TutorErrorCode,
	message: string,
	details: ApiIssue[] | undefined,
	now: () => Date
): FailureResponse {
	return {
		status: STATUS_BY_CODE[code],
		body: {
			success: false,
			error: code,
			message,
			...(details && details.length > 0 ? { details } : {}),
			timestamp: now().getTime()
		}
	};
}

function readErrorCode(error: unknown): TutorErrorCode {
	if (typeof error !== "object" || error === null) {
		return "INTERNAL_ERROR";
	}

	if ("code" in error) {
		const parsed = TutorErrorCodeSchema.safeParse(error.code);
		if (parsed.success) {
			return parsed.data;
		}
	}

	// Fastify's own client errors (malformed JSON, wrong content type).
	if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
		return "VALIDATION_ERROR";
	}

	return "INTERNAL_ERROR";
}

function readIssues(error: unknown): ApiIssue[] | undefined {
	if (typeof error !== "object" || error === null || !("issues" in error) || !Array.isArray(error.issues)) {
		return undefined;
	}

	return error.issues.filter(
		(issue): issue is ApiIssue =>
			typeof issue === "object" &&
			issue !== null &&
			"path" in issue &&
			typeof issue.path === "string" &&
			"message" in issue &&
			typeof issue.message === "string"
	);
}
