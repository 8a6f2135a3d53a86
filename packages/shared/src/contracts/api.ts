import { z } from "zod";

export const TUTOR_ERROR_CODES = [
	"VALIDATION_ERROR",
	"SESSION_NOT_FOUND",
	"LLM_NOT_CONFIGURED",
	"TIMEOUT",
	"LLM_REQUEST_FAILED",
	"LLM_UNREACHABLE",
	"EMPTY_RESPONSE",
	"STORAGE_ERROR",
	"INTERNAL_ERROR"
] as const;

export const TutorErrorCodeSchema = z.enum(TUTOR_ERROR_CODES);
export type TutorErrorCode = z.infer<typeof TutorErrorCodeSchema>;

export const ApiIssueSchema = z.object({
	path: z.string(),
	message: z.string()
});

export type ApiIssue = z.infer<typeof ApiIssueSchema>;

export const ApiFailureSchema = z.object({
	success: z.literal(false),
	error: z.string().min(1),
	message: z.string(),
	details: z.array(ApiIssueSchema).optional(),
	timestamp: z.number().int().nonnegative()
});

export type ApiFailure = z.infer<typeof ApiFailureSchema>;

export interface ApiSuccess<T> {
	success: true;
	data: T;
	timestamp: number;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

/**
 * Builds the success envelope schema for a payload schema, so clients can
 * validate `{ success: true, data, timestamp }` responses end to end.
 */
export function createApiSuccessSchema<T extends z.ZodTypeAny>(data: T) {
	return z.object({
		success: z.literal(true),
		data,
		timestamp: z.number().int().nonnegative()
	});
}

export function isApiFailure(value: unknown): value is ApiFailure {
	return ApiFailureSchema.safeParse(value).success;
}

/**
 * Flattens zod issues into the `details` shape used by failure envelopes.
 */
export function toApiIssues(error: z.ZodError): ApiIssue[] {
	return error.issues.map((issue) => ({
		path: issue.path.join("."),
		message: issue.message
	}));
}
