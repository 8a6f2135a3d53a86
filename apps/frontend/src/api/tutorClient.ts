import { createApiSuccessSchema, isApiFailure } from "@language-tutor/shared";
import type { ApiIssue } from "@language-tutor/shared";
import {
  ChatTurnResultSchema,
  FeedbackSummarySchema,
  HealthStatusSchema,
  LessonSessionSchema,
  MistakeRecordSchema
} from "@language-tutor/shared/tutor";
import type {
  ChatTurnResult,
  ErrorType,
  FeedbackSummary,
  HealthStatus,
  LessonConfigInput,
  LessonSession,
  MistakeRecord
} from "@language-tutor/shared/tutor";
import { z } from "zod";

export const DEFAULT_API_BASE = "/api";

/** Codes raised by the client itself; the backend supplies the rest. */
export const NETWORK_ERROR = "NETWORK_ERROR" as const;
export const INVALID_RESPONSE = "INVALID_RESPONSE" as const;

export class TutorApiError extends Error {
  readonly code: string;
  readonly status: number | null;
  readonly details: ApiIssue[];

  constructor(code: string, message: string, options: { status?: number | null; details?: ApiIssue[] } = {}) {
    super(message);
    this.name = "TutorApiError";
    this.code = code;
    this.status = options.status ?? null;
    this.details = options.details ?? [];
  }
}

export interface MistakeQuery {
  limit?: number;
  targetLanguage?: string;
  errorType?: ErrorType;
  sessionId?: string;
}

export interface FeedbackQuery {
  days?: number;
  targetLanguage?: string;
  recentLimit?: number;
}

/** What the hooks need from the backend; tests substitute their own. */
export interface TutorApi {
  getHealth(): Promise<HealthStatus>;
  startLesson(config: LessonConfigInput): Promise<LessonSession>;
  sendMessage(sessionId: string, content: string): Promise<ChatTurnResult>;
  endLesson(sessionId: string): Promise<void>;
  listMistakes(query?: MistakeQuery): Promise<MistakeRecord[]>;
  clearMistakes(targetLanguage?: string): Promise<number>;
  getFeedback(query?: FeedbackQuery): Promise<FeedbackSummary>;
  exportUrl(targetLanguage?: string): string;
}

export interface TutorApiClientOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

type QueryValue = string | number | undefined;

const MistakeListSchema = z.object({ mistakes: z.array(MistakeRecordSchema) });
const EndedSchema = z.object({ ended: z.literal(true) });
const DeletedSchema = z.object({ deleted: z.number().int().nonnegative() });
const SuccessEnvelopeSchema = createApiSuccessSchema(z.unknown());

function buildQuery(params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === "") {
      continue;
    }
    search.set(key, String(value));
  }
  const query = search.toString();
  return query ? `?${query}` : "";
}

function getErrorMessage(value: unknown): string {
  if (value instanceof Error && value.message) {
    return value.message;
  }
  return "Unexpected error";
}

export class TutorApiClient implements TutorApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TutorApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  getHealth(): Promise<HealthStatus> {
    return this.request("/health", { method: "GET" }, HealthStatusSchema);
  }

  startLesson(config: LessonConfigInput): Promise<LessonSession> {
    return this.request("/lessons", this.jsonInit("POST", { config }), LessonSessionSchema);
  }

  sendMessage(sessionId: string, content: string): Promise<ChatTurnResult> {
    return this.request(
      `/lessons/${encodeURIComponent(sessionId)}/messages`,
      this.jsonInit("POST", { content }),
      ChatTurnResultSchema
    );
  }

  async endLesson(sessionId: string): Promise<void> {
    await this.request(`/lessons/${encodeURIComponent(sessionId)}`, { method: "DELETE" }, EndedSchema);
  }

  async listMistakes(query: MistakeQuery = {}): Promise<MistakeRecord[]> {
    const search = buildQuery({
      limit: query.limit,
      targetLanguage: query.targetLanguage,
      errorType: query.errorType,
      sessionId: query.sessionId
    });
    const data = await this.request(`/mistakes${search}`, { method: "GET" }, MistakeListSchema);
    return data.mistakes;
  }

  async clearMistakes(targetLanguage?: string): Promise<number> {
    const data = await this.request(`/mistakes${buildQuery({ targetLanguage })}`, { method: "DELETE" }, DeletedSchema);
    return data.deleted;
  }

  getFeedback(query: FeedbackQuery = {}): Promise<FeedbackSummary> {
    const search = buildQuery({
      days: query.days,
      targetLanguage: query.targetLanguage,
      recentLimit: query.recentLimit
    });
    return this.request(`/feedback${search}`, { method: "GET" }, FeedbackSummarySchema);
  }

  exportUrl(targetLanguage?: string): string {
    return `${this.baseUrl}/mistakes/export${buildQuery({ targetLanguage })}`;
  }

  private jsonInit(method: string, body: unknown): RequestInit {
    return {
      method,
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body)
    };
  }

  private async request<T>(path: string, init: RequestInit, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    } catch (error) {
      throw new TutorApiError(NETWORK_ERROR, `Could not reach the tutor service: ${getErrorMessage(error)}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new TutorApiError(INVALID_RESPONSE, `Tutor service returned a non-JSON response (HTTP ${response.status})`, {
        status: response.status
      });
    }

    if (isApiFailure(payload)) {
      throw new TutorApiError(payload.error, payload.message, {
        status: response.status,
        details: payload.details
      });
    }

    const envelope = SuccessEnvelopeSchema.safeParse(payload);
    if (envelope.success) {
      const parsed = schema.safeParse(envelope.data.data);
      if (parsed.success) {
        return parsed.data;
      }
    }

    throw new TutorApiError(INVALID_RESPONSE, "Tutor service returned an unexpected response", {
      status: response.status
    });
  }
}

export const defaultTutorClient: TutorApi = new TutorApiClient();
