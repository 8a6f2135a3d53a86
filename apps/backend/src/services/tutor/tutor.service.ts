import { generateUUID, toApiIssues } from "@language-tutor/shared";
import {
	ChatInputSchema,
	LessonConfigSchema,
	type ChatMessage,
	type ChatTurnResult,
	type LessonSession,
	type MistakeRecord
} from "@language-tutor/shared/tutor";

import type { TutorEvent, TutorEventRecorder } from "../../infra/logging/tutor-event-logger.js";
import type {
	ChatCompletionResult,
	ChatModel,
	ConversationMessage
} from "../llm/chat-completion.client.js";
import {
	FOLLOW_UP_INPUT,
	LOG_MISTAKE_TOOL,
	LOG_MISTAKE_TOOL_NAME,
	buildLessonOpener,
	buildSystemPrompt
} from "../llm/prompts.js";
import type { MistakeLogService, MistakeValidation, PendingMistake } from "../mistakes/mistake-log.service.js";
import { LessonConfigError, LlmEmptyResponseError, SessionNotFoundError } from "./errors.js";
import { SessionStore, toLessonSession, type SessionState } from "./session-store.js";

export interface TutorServiceOptions {
	chatModel: ChatModel;
	mistakeLog: MistakeLogService;
	sessions?: SessionStore;
	eventRecorder?: TutorEventRecorder | null;
	/** Base URL reported (as a hostname) when a model request fails. */
	baseUrl?: string;
	now?: () => Date;
	idGenerator?: () => string;
}

interface TurnOutcome {
	reply: string;
	messages: ConversationMessage[];
	mistakes: MistakeRecord[];
	latencyMs: number;
	toolCallCount: number;
	followUp: boolean;
}

/**
 * Orchestrates lessons: keeps per-session history, calls the model with the
 * tutor prompt and the `log_mistake` tool, and persists the mistakes it logs.
 */
export class TutorService {
	private readonly chatModel: ChatModel;
	private readonly mistakeLog: MistakeLogService;
	private readonly sessions: SessionStore;
	private readonly eventRecorder: TutorEventRecorder | null;
	private readonly baseUrl: string | undefined;
	private readonly now: () => Date;
	private readonly generateId: () => string;

	constructor(options: TutorServiceOptions) {
		this.chatModel = options.chatModel;
		this.mistakeLog = options.mistakeLog;
		this.sessions = options.sessions ?? new SessionStore();
		this.eventRecorder = options.eventRecorder ?? null;
		this.baseUrl = options.baseUrl;
		this.now = options.now ?? (() => new Date());
		this.generateId = options.idGenerator ?? generateUUID;
	}

	async startLesson(input: unknown): Promise<LessonSession> {
		const parsed = LessonConfigSchema.safeParse(input);
		if (!parsed.success) {
			const issues = toApiIssues(parsed.error);
			throw new LessonConfigError(issues[0]?.message ?? "Invalid lesson configuration", issues);
		}

		const config = parsed.data;
		const session = this.sessions.create(this.generateId(), config, this.now());

		let outcome: TurnOutcome;
		try {
			outcome = await this.runTurn(session, buildLessonOpener(config), { persistMistakes: false });
		} catch (error) {
			this.sessions.delete(session.sessionId);
			await this.recordLlmFailure(session.sessionId, error);
			throw error;
		}

		const at = this.now();
		this.sessions.appendTurn(session, { messages: outcome.messages }, at);
		session.messages.push(this.createMessage("assistant", outcome.reply, at));

		await this.recordEvent({
			type: "lesson_started",
			sessionId: session.sessionId,
			nativeLanguage: config.nativeLanguage,
			learningLanguage: config.learningLanguage,
			proficiencyLevel: config.proficiencyLevel,
			scenario: config.scenario,
			timestamp: at.getTime()
		});

		return toLessonSession(session);
	}

	async sendMessage(sessionId: string, input: unknown): Promise<ChatTurnResult> {
		const parsed = ChatInputSchema.safeParse(typeof input === "string" ? { content: input } : input);
		if (!parsed.success) {
			const issues = toApiIssues(parsed.error);
			throw new LessonConfigError(issues[0]?.message ?? "Invalid chat message", issues);
		}

		const session = this.requireSession(sessionId);
		const userMessage = this.createMessage("user", parsed.data.content, this.now());
		session.messages.push(userMessage);

		let outcome: TurnOutcome;
		try {
			outcome = await this.runTurn(session, userMessage.content, { persistMistakes: true });
		} catch (error) {
			const index = session.messages.indexOf(userMessage);
			if (index >= 0) {
				session.messages.splice(index, 1);
			}
			await this.recordLlmFailure(sessionId, error);
			throw error;
		}

		const at = this.now();
		this.sessions.appendTurn(session, { messages: outcome.messages }, at);
		const reply = this.createMessage("assistant", outcome.reply, at);
		session.messages.push(reply);

		await this.recordEvent({
			type: "chat_turn_completed",
			sessionId,
			latencyMs: outcome.latencyMs,
			toolCallCount: outcome.toolCallCount,
			mistakesLogged: outcome.mistakes.length,
			followUp: outcome.followUp,
			timestamp: at.getTime()
		});

		return { sessionId, reply: { ...reply }, mistakes: outcome.mistakes };
	}

	getSession(sessionId: string): LessonSession {
		return toLessonSession(this.requireSession(sessionId));
	}

	async endLesson(sessionId: string): Promise<void> {
		const session = this.sessions.delete(sessionId);
		if (!session) {
			throw new SessionNotFoundError(sessionId);
		}

		await this.recordEvent({
			type: "lesson_ended",
			sessionId,
			turns: session.messages.filter((message) => message.role === "user").length,
			timestamp: this.now().getTime()
		});
	}

	private requireSession(sessionId: string): SessionState {
		const session = this.sessions.get(sessionId);
		if (!session) {
			throw new SessionNotFoundError(sessionId);
		}
		return session;
	}

	private async runTurn(
		session: SessionState,
		input: string,
		options: { persistMistakes: boolean }
	): Promise<TurnOutcome> {
		const turnMessages: ConversationMessage[] = [{ role: "user", content: input }];
		const pending: PendingMistake[] = [];

		const first = await this.complete(session, turnMessages);
		let latencyMs = first.latencyMs;
		let toolCallCount = first.toolCalls.length;
		await this.answerToolCalls(session, first, turnMessages, options.persistMistakes ? pending : null);

		let reply = first.content;
		let followUp = false;
		if (reply === null) {
			followUp = true;
			turnMessages.push({ role: "user", content: FOLLOW_UP_INPUT });
			const second = await this.complete(session, turnMessages);
			latencyMs += second.latencyMs;
			toolCallCount += second.toolCalls.length;
			await this.answerToolCalls(session, second, turnMessages, null);
			reply = second.content;
		}

		if (reply === null) {
			throw new LlmEmptyResponseError();
		}

		// A failed turn stores no mistakes.
		const mistakes: MistakeRecord[] = [];
		for (const mistake of pending) {
			const outcome = await this.mistakeLog.persist(mistake, session.sessionId);
			if (outcome.status === "logged") {
				mistakes.push(outcome.mistake);
			}
		}

		return { reply, messages: turnMessages, mistakes, latencyMs, toolCallCount, followUp };
	}

	private complete(session: SessionState, turnMessages: ConversationMessage[]): Promise<ChatCompletionResult> {
		return this.chatModel.complete({
			messages: [
				{ role: "system", content: buildSystemPrompt(session.config) },
				...this.sessions.historyFor(session),
				...turnMessages
			],
			tools: [LOG_MISTAKE_TOOL]
		});
	}

	/**
	 * Appends the assistant message and one tool result per call to the turn.
	 * Valid mistakes are collected into `pending` only when it is given.
	 */
	private async answerToolCalls(
		session: SessionState,
		result: ChatCompletionResult,
		turnMessages: ConversationMessage[],
		pending: PendingMistake[] | null
	): Promise<void> {
		if (result.content === null && result.toolCalls.length === 0) {
			return;
		}

		turnMessages.push({
			role: "assistant",
			content: result.content,
			...(result.toolCalls.length > 0 ? { toolCalls: result.toolCalls } : {})
		});

		for (const call of result.toolCalls) {
			let content: string;
			if (call.name !== LOG_MISTAKE_TOOL_NAME) {
				content = `Unknown tool ${call.name}`;
			} else if (!pending) {
				content = "Acknowledged";
			} else {
				const validation = await this.mistakeLog.validateToolCall(call.arguments, {
					sessionId: session.sessionId,
					config: session.config
				});
				if (validation.status === "accepted") {
					pending.push(validation.mistake);
				}
				content = describeValidation(validation);
			}
			turnMessages.push({ role: "tool", toolCallId: call.id, content });
		}
	}

	private createMessage(role: ChatMessage["role"], content: string, at: Date): ChatMessage {
		return { id: this.generateId(), role, content, createdAt: at.toISOString() };
	}

	private async recordLlmFailure(sessionId: string, error: unknown): Promise<void> {
		await this.recordEvent({
			type: "llm_request_failed",
			sessionId,
			errorCode: errorCodeOf(error),
			message: error instanceof Error ? error.message : String(error),
			...(this.baseUrl ? { baseUrl: this.baseUrl } : {}),
			timestamp: this.now().getTime()
		});
	}

	private async recordEvent(event: TutorEvent): Promise<void> {
		if (!this.eventRecorder) {
			return;
		}
		await this.eventRecorder.record(event);
	}
}

function describeValidation(validation: MistakeValidation): string {
	switch (validation.status) {
		case "accepted":
			return "Mistake logged";
		case "rejected":
			return `Mistake not logged: ${validation.reason}`;
	}
}

function errorCodeOf(error: unknown): string {
	if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return "INTERNAL_ERROR";
}
