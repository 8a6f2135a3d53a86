import { performance } from "node:perf_hooks";

const DEFAULT_TIMEOUT_MS = 30_000;

export type ConversationMessage =
	| { role: "system"; content: string }
	| { role: "user"; content: string }
	| { role: "assistant"; content: string | null; toolCalls?: ToolCall[] }
	| { role: "tool"; toolCallId: string; content: string };

export interface ToolCall {
	id: string;
	name: string;
	arguments: Record<string, unknown>;
}

export interface ToolDefinition {
	type: "function";
	function: {
		name: string;
		description: string;
		parameters: Record<string, unknown>;
	};
}

export interface ChatCompletionRequest {
	messages: ConversationMessage[];
	tools?: ToolDefinition[];
}

export interface ChatCompletionResult {
	content: string | null;
	toolCalls: ToolCall[];
	model: string | null;
	latencyMs: number;
}

/** Anything that can run a chat completion; the tutor depends on this, tests stub it. */
export interface ChatModel {
	readonly model: string;
	readonly configured: boolean;
	complete(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}

export interface ChatCompletionClientOptions {
	apiKey: string | null;
	baseUrl: string;
	model: string;
	temperature: number;
	timeoutMs?: number;
	fetchImpl?: typeof fetch;
}

export class LlmNotConfiguredError extends Error {
	readonly code = "LLM_NOT_CONFIGURED" as const;

	constructor() {
		super("OPENAI_API_KEY is not set; the tutor cannot reach the language model");
		this.name = "LlmNotConfiguredError";
	}
}

export class LlmTimeoutError extends Error {
	readonly code = "TIMEOUT" as const;

	constructor(timeoutMs: number) {
		super(`Language model request timed out after ${timeoutMs}ms`);
		this.name = "LlmTimeoutError";
	}
}

export class LlmRequestError extends Error {
	readonly code = "LLM_REQUEST_FAILED" as const;

	constructor(
		message: string,
		readonly status: number,
		readonly providerCode: string,
		readonly remediation: string
	) {
		super(message);
		this.name = "LlmRequestError";
	}
}

export class LlmNetworkError extends Error {
	readonly code = "LLM_UNREACHABLE" as const;

	constructor(
		message: string,
		readonly networkCode: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "LlmNetworkError";
	}
}

/**
 * Client for OpenAI-compatible `/chat/completions` endpoints with tool calling.
 */
export class ChatCompletionClient implements ChatModel {
	readonly model: string;
	private readonly apiKey: string | null;
	private readonly baseUrl: string;
	private readonly temperature: number;
	private readonly timeoutMs: number;
	private readonly fetchImpl: typeof fetch;

	constructor(options: ChatCompletionClientOptions) {
		this.apiKey = options.apiKey;
		this.baseUrl = options.baseUrl.replace(/\/+$/u, "");
		this.model = options.model;
		this.temperature = options.temperature;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
	}

	get configured(): boolean {
		return this.apiKey !== null && this.apiKey.length > 0;
	}

	async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
		if (!this.apiKey) {
			throw new LlmNotConfiguredError();
		}

		const url = new URL(`${this.baseUrl}/chat/completions`);
		const body: Record<string, unknown> = {
			model: this.model,
			temperature: this.temperature,
			messages: request.messages.map(toWireMessage)
		};
		if (request.tools && request.tools.length > 0) {
			body.tools = request.tools;
			body.tool_choice = "auto";
		}

		const start = performance.now();
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

		try {
			const response = await this.fetchImpl(url.toString(), {
				method: "POST",
				headers: {
					"content-type": "application/json",
					authorization: `Bearer ${this.apiKey}`
				},
				body: JSON.stringify(body),
				signal: controller.signal
			});
			const rawBody = await response.text();
			const latencyMs = Math.max(1, Math.round(performance.now() - start));

			if (!response.ok) {
				throw mapHttpError(response.status, rawBody);
			}

			return { ...parseCompletion(rawBody), latencyMs };
		} catch (error: unknown) {
			if (isAbortError(error)) {
				throw new LlmTimeoutError(this.timeoutMs);
			}

			if (error instanceof LlmRequestError) {
				throw error;
			}

			throw mapNetworkError(error, url);
		} finally {
			clearTimeout(timeoutId);
		}
	}
}

function toWireMessage(message: ConversationMessage): Record<string, unknown> {
	switch (message.role) {
		case "assistant":
			if (message.toolCalls && message.toolCalls.length > 0) {
				return {
					role: "assistant",
					content: message.content,
					tool_calls: message.toolCalls.map((call) => ({
						id: call.id,
						type: "function",
						function: { name: call.name, arguments: JSON.stringify(call.arguments) }
					}))
				};
			}
			return { role: "assistant", content: message.content ?? "" };
		case "tool":
			return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
		default:
			return { role: message.role, content: message.content };
	}
}

function parseCompletion(rawBody: string): Omit<ChatCompletionResult, "latencyMs"> {
	const parsed = safeJsonParse(rawBody);
	if (!isRecord(parsed)) {
		return { content: null, toolCalls: [], model: null };
	}

	const model = typeof parsed.model === "string" ? parsed.model : null;
	const choices = Array.isArray(parsed.choices) ? parsed.choices : [];
	const choice = choices.find(isRecord);
	const message: unknown = choice?.message;
	if (!isRecord(message)) {
		return { content: null, toolCalls: [], model };
	}

	return {
		content: extractContent(message.content),
		toolCalls: extractToolCalls(message.tool_calls),
		model
	};
}

function extractContent(value: unknown): string | null {
	if (typeof value === "string") {
		const sanitized = sanitizeText(value);
		return sanitized.length > 0 ? sanitized : null;
	}

	if (Array.isArray(value)) {
		const parts = value
			.map((part) => (isRecord(part) && typeof part.text === "string" ? sanitizeText(part.text) : ""))
			.filter((part) => part.length > 0);
		return parts.length > 0 ? parts.join("\n\n") : null;
	}

	return null;
}

function extractToolCalls(value: unknown): ToolCall[] {
	if (!Array.isArray(value)) {
		return [];
	}

	const calls: ToolCall[] = [];
	value.forEach((candidate, index) => {
		if (!isRecord(candidate)) {
			return;
		}

		const fn = candidate.function;
		if (!isRecord(fn) || typeof fn.name !== "string" || fn.name.length === 0) {
			return;
		}

		const name = fn.name;
		const rawArguments = fn.arguments;
		const args = typeof rawArguments === "string" ? safeJsonParse(rawArguments) : rawArguments;
		calls.push({
			id: typeof candidate.id === "string" && candidate.id.length > 0 ? candidate.id : `call_${index}`,
			name,
			arguments: isRecord(args) ? args : {}
		});
	});

	return calls;
}

const HTTP_ERROR_MESSAGES: Record<number, string> = {
	401: "Invalid API key. Check OPENAI_API_KEY.",
	403: "The API key does not have access to this model.",
	404: "Model or endpoint not found. Check TUTOR_MODEL and OPENAI_BASE_URL.",
	429: "Rate limit exceeded. Try again in a few minutes."
};

const REMEDIATIONS: Record<string, string> = {
	"401": "Check your API key is valid",
	"403": "Verify your API key has the required permissions",
	"404": "Verify the model name and base URL",
	"429": "Rate limit exceeded. Wait before retrying",
	"500": "Service error. Try again later",
	"503": "Service temporarily unavailable"
};

function mapHttpError(status: number, rawBody: string): LlmRequestError {
	const details = extractErrorObject(rawBody);
	const providerCode = typeof details.code === "string" && details.code.length > 0 ? details.code : String(status);
	const providerMessage =
		typeof details.message === "string" && details.message.trim().length > 0 ? details.message.trim() : null;
	const message =
		HTTP_ERROR_MESSAGES[status] ??
		(status >= 500 ? "The language model service failed. Try again later." : null) ??
		providerMessage ??
		`Language model request failed with status ${status}`;

	return new LlmRequestError(
		message,
		status,
		providerCode,
		REMEDIATIONS[String(status)] ?? "Check your configuration and try again"
	);
}

function mapNetworkError(error: unknown, url: URL): LlmNetworkError {
	const networkCode = deriveNetworkCode(error);
	const friendly: Record<string, string> = {
		ECONNREFUSED: `Unable to connect to ${url.origin}. Is the server running?`,
		ENOTFOUND: `Could not resolve hostname ${url.hostname}. Check OPENAI_BASE_URL.`,
		ECONNRESET: "Connection reset by the language model service."
	};
	const fallback = error instanceof Error && error.message ? error.message : "Network request failed";
	return new LlmNetworkError(friendly[networkCode] ?? fallback, networkCode, { cause: error });
}

function deriveNetworkCode(error: unknown): string {
	if (isRecord(error) && typeof error.code === "string" && error.code.length > 0) {
		return error.code;
	}

	if (error instanceof Error && isRecord(error.cause) && typeof error.cause.code === "string") {
		return error.cause.code;
	}

	return "NETWORK_ERROR";
}

function extractErrorObject(rawBody: string): { code?: unknown; message?: unknown } {
	const parsed = safeJsonParse(rawBody);
	if (!isRecord(parsed)) {
		return {};
	}

	if (isRecord(parsed.error)) {
		return { code: parsed.error.code, message: parsed.error.message };
	}

	return { code: parsed.code, message: parsed.message };
}

function sanitizeText(value: string): string {
	return value.replace(ANSI_ESCAPE_SEQUENCE_REGEX, "").replace(CONTROL_CHARACTERS_REGEX, "").trim();
}

function isAbortError(error: unknown): boolean {
	if (typeof DOMException !== "undefined" && error instanceof DOMException) {
		return error.name === "AbortError";
	}
	return error instanceof Error && error.name === "AbortError";
}

function safeJsonParse(value: string): unknown {
	try {
		return JSON.parse(value) as unknown;
	} catch {
		return null;
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

const ANSI_ESCAPE_SEQUENCE_REGEX = /\u001B\[[0-?]*[ -/]*[@-~]/g; // eslint-disable-line no-control-regex
const CONTROL_CHARACTERS_REGEX = /[\u0000-\u0008\u000B-\u001F\u007F]/g; // eslint-disable-line no-control-regex
