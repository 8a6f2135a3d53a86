import type { ChatMessage, LessonConfig, LessonSession } from "@language-tutor/shared/tutor";

import type { ConversationMessage } from "../llm/chat-completion.client.js";

export const DEFAULT_MAX_SESSIONS = 100;
export const DEFAULT_HISTORY_TURN_LIMIT = 20;

/**
 * Everything the model produced for one input: the input itself, each
 * assistant message with its tool calls, and the tool results answering them.
 */
export interface ConversationTurn {
	messages: ConversationMessage[];
}

export interface SessionState {
	sessionId: string;
	config: LessonConfig;
	messages: ChatMessage[];
	history: ConversationTurn[];
	startedAt: string;
	lastActiveAt: number;
}

export interface SessionStoreOptions {
	maxSessions?: number;
	historyTurnLimit?: number;
}

/**
 * Live lesson sessions, least recently used first. Reading or writing a
 * session marks it as used; the oldest is evicted beyond `maxSessions`.
 */
export class SessionStore {
	private readonly sessions = new Map<string, SessionState>();
	private readonly maxSessions: number;
	private readonly historyTurnLimit: number;

	constructor(options: SessionStoreOptions = {}) {
		this.maxSessions = Math.max(1, options.maxSessions ?? DEFAULT_MAX_SESSIONS);
		this.historyTurnLimit = Math.max(1, options.historyTurnLimit ?? DEFAULT_HISTORY_TURN_LIMIT);
	}

	get size(): number {
		return this.sessions.size;
	}

	create(sessionId: string, config: LessonConfig, startedAt: Date): SessionState {
		const state: SessionState = {
			sessionId,
			config,
			messages: [],
			history: [],
			startedAt: startedAt.toISOString(),
			lastActiveAt: startedAt.getTime()
		};
		this.sessions.set(sessionId, state);
		this.evictOverflow();
		return state;
	}

	get(sessionId: string): SessionState | null {
		const state = this.sessions.get(sessionId);
		if (!state) {
			return null;
		}
		this.sessions.delete(sessionId);
		this.sessions.set(sessionId, state);
		return state;
	}

	delete(sessionId: string): SessionState | null {
		const state = this.sessions.get(sessionId) ?? null;
		this.sessions.delete(sessionId);
		return state;
	}

	appendTurn(state: SessionState, turn: ConversationTurn, at: Date): void {
		state.history.push(turn);
		if (state.history.length > this.historyTurnLimit) {
			state.history.splice(0, state.history.length - this.historyTurnLimit);
		}
		state.lastActiveAt = at.getTime();
	}

	/** Flattened LLM messages of the turns still inside the history window. */
	historyFor(state: SessionState): ConversationMessage[] {
		return state.history.flatMap((turn) => turn.messages);
	}

	private evictOverflow(): void {
		while (this.sessions.size > this.maxSessions) {
			const oldest = this.sessions.keys().next();
			if (oldest.done) {
				return;
			}
			this.sessions.delete(oldest.value);
		}
	}
}

export function toLessonSession(state: SessionState): LessonSession {
	return {
		sessionId: state.sessionId,
		config: state.config,
		messages: state.messages.map((message) => ({ ...message })),
		startedAt: state.startedAt
	};
}
