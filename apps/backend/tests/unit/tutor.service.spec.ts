import type { LessonConfig } from "@language-tutor/shared/tutor";
import { beforeEach, describe, expect, it } from "vitest";

import type { TutorEvent, TutorEventRecorder } from "../../src/infra/logging/index.js";
import { LlmTimeoutError } from "../../src/services/llm/chat-completion.client.js";
import { FOLLOW_UP_INPUT, LOG_MISTAKE_TOOL, buildSystemPrompt } from "../../src/services/llm/prompts.js";
import { InMemoryMistakeStore } from "../../src/services/mistakes/in-memory-mistake-store.js";
import { MistakeLogService } from "../../src/services/mistakes/mistake-log.service.js";
import { SessionStore } from "../../src/services/tutor/session-store.js";
import { TutorService } from "../../src/services/tutor/tutor.service.js";
import { ScriptedChatModel } from "../helpers/chat-completions.js";

const NOW = new Date("2024-05-01T10:00:00.000Z");

const lessonConfig: LessonConfig = {
	nativeLanguage: "English",
	learningLanguage: "Spanish",
	proficiencyLevel: "Beginner",
	scenario: "Restaurant"
};

const mistakeArgs = {
	native_lang: "English",
	target_lang: "Spanish",
	error_sentence: "Yo tener hambre",
	corrected_sentence: "Yo tengo hambre",
	error_type: "grammar"
};

function uuid(index: number): string {
	return `00000000-0000-4000-8000-${String(index).padStart(12, "0")}`;
}

interface Harness {
	service: TutorService;
	chatModel: ScriptedChatModel;
	store: InMemoryMistakeStore;
	events: TutorEvent[];
}

function createHarness(options: { sessions?: SessionStore } = {}): Harness {
	let counter = 0;
	const events: TutorEvent[] = [];
	const eventRecorder: TutorEventRecorder = {
		record: async (event) => {
			events.push(event);
		}
	};
	const store = new InMemoryMistakeStore();
	const chatModel = new ScriptedChatModel([{ content: "¡Bienvenido! ¿Qué desea comer?" }]);
	const service = new TutorService({
		chatModel,
		mistakeLog: new MistakeLogService({ store, eventRecorder, now: () => NOW }),
		sessions: options.sessions,
		eventRecorder,
		baseUrl: "https://api.openai.com/v1",
		now: () => NOW,
		idGenerator: () => {
			counter += 1;
			return uuid(counter);
		}
	});
	return { service, chatModel, store, events };
}

describe("TutorService.startLesson", () => {
	it("opens a fresh session with the model's first message", async () => {
		const { service, chatModel, events } = createHarness();

		const session = await service.startLesson(lessonConfig);

		expect(session).toEqual({
			sessionId: uuid(1),
			config: lessonConfig,
			messages: [
				{
					id: uuid(2),
					role: "assistant",
					content: "¡Bienvenido! ¿Qué desea comer?",
					createdAt: "2024-05-01T10:00:00.000Z"
				}
			],
			startedAt: "2024-05-01T10:00:00.000Z"
		});
		expect(chatModel.requests[0]).toEqual({
			messages: [
				{ role: "system", content: buildSystemPrompt(lessonConfig) },
				{ role: "user", content: "Begin Restaurant scenario" }
			],
			tools: [LOG_MISTAKE_TOOL]
		});
		expect(events).toEqual([
			{
				type: "lesson_started",
				sessionId: uuid(1),
				nativeLanguage: "English",
				learningLanguage: "Spanish",
				proficiencyLevel: "Beginner",
				scenario: "Restaurant",
				timestamp: NOW.getTime()
			}
		]);
	});

	it("applies default proficiency and scenario", async () => {
		const { service } = createHarness();

		const session = await service.startLesson({ nativeLanguage: " English ", learningLanguage: "French" });

		expect(session.config).toEqual({
			nativeLanguage: "English",
			learningLanguage: "French",
			proficiencyLevel: "Beginner",
			scenario: "Restaurant"
		});
	});

	it("requires both languages", async () => {
		const { service, chatModel } = createHarness();

		await expect(service.startLesson({ nativeLanguage: "English", learningLanguage: "  " })).rejects.toMatchObject({
			code: "VALIDATION_ERROR",
			message: "Please specify both languages",
			issues: [{ path: "learningLanguage", message: "Please specify both languages" }]
		});
		expect(chatModel.requests).toHaveLength(0);
	});

	it("drops the session when the opener fails", async () => {
		const sessions = new SessionStore();
		const { service, chatModel, events } = createHarness({ sessions });
		await service.startLesson(lessonConfig);
		chatModel.enqueue(new LlmTimeoutError(10));

		await expect(service.startLesson(lessonConfig)).rejects.toBeInstanceOf(LlmTimeoutError);
		expect(sessions.size).toBe(1);
		expect(events.at(-1)).toEqual({
			type: "llm_request_failed",
			sessionId: uuid(3),
			errorCode: "TIMEOUT",
			message: "Language model request timed out after 10ms",
			baseUrl: "https://api.openai.com/v1",
			timestamp: NOW.getTime()
		});
	});
});

describe("TutorService.sendMessage", () => {
	let harness: Harness;
	let sessionId: string;

	beforeEach(async () => {
		harness = createHarness();
		sessionId = (await harness.service.startLesson(lessonConfig)).sessionId;
		harness.events.length = 0;
	});

	it("logs mistakes reported through tool calls", async () => {
		const { service, chatModel, store, events } = harness;
		chatModel.enqueue({
			content: "(Note: Yo tener hambre → Yo tengo hambre) ¿Qué quiere comer?",
			toolCalls: [{ id: "call_1", name: "log_mistake", arguments: mistakeArgs }]
		});

		const result = await service.sendMessage(sessionId, "  Yo tener hambre ");

		expect(result.sessionId).toBe(sessionId);
		expect(result.reply).toMatchObject({
			role: "assistant",
			content: "(Note: Yo tener hambre → Yo tengo hambre) ¿Qué quiere comer?"
		});
		expect(result.mistakes).toEqual([
			{
				id: 1,
				timestamp: "2024-05-01T10:00:00.000Z",
				sessionId,
				nativeLanguage: "English",
				targetLanguage: "Spanish",
				errorSentence: "Yo tener hambre",
				correctedSentence: "Yo tengo hambre",
				errorType: "grammar"
			}
		]);
		expect(await store.count({ sessionId })).toBe(1);
		expect(chatModel.requests[1]?.messages.slice(1)).toEqual([
			{ role: "user", content: "Begin Restaurant scenario" },
			{ role: "assistant", content: "¡Bienvenido! ¿Qué desea comer?" },
			{ role: "user", content: "Yo tener hambre" }
		]);
		expect(events.map((event) => event.type)).toEqual(["mistake_logged", "chat_turn_completed"]);
		expect(events[1]).toEqual({
			type: "chat_turn_completed",
			sessionId,
			latencyMs: 5,
			toolCallCount: 1,
			mistakesLogged: 1,
			followUp: false,
			timestamp: NOW.getTime()
		});

		expect(service.getSession(sessionId).messages.map((message) => [message.role, message.content])).toEqual([
			["assistant", "¡Bienvenido! ¿Qué desea comer?"],
			["user", "Yo tener hambre"],
			["assistant", "(Note: Yo tener hambre → Yo tengo hambre) ¿Qué quiere comer?"]
		]);
	});

	it("keeps each tool call next to its result in later requests", async () => {
		const { service, chatModel } = harness;
		chatModel.enqueue(
			{
				content: "¿Qué quiere comer?",
				toolCalls: [
					{ id: "call_1", name: "log_mistake", arguments: mistakeArgs },
					{ id: "call_2", name: "lookup_menu", arguments: {} }
				]
			},
			{ content: "Muy bien." }
		);

		await service.sendMessage(sessionId, "Yo tener hambre");
		await service.sendMessage(sessionId, "Quiero paella");

		expect(chatModel.requests[2]?.messages.slice(3)).toEqual([
			{ role: "user", content: "Yo tener hambre" },
			{
				role: "assistant",
				content: "¿Qué quiere comer?",
				toolCalls: [
					{ id: "call_1", name: "log_mistake", arguments: mistakeArgs },
					{ id: "call_2", name: "lookup_menu", arguments: {} }
				]
			},
			{ role: "tool", toolCallId: "call_1", content: "Mistake logged" },
			{ role: "tool", toolCallId: "call_2", content: "Unknown tool lookup_menu" },
			{ role: "user", content: "Quiero paella" }
		]);
	});

	it("asks for a follow-up when the model only calls tools", async () => {
		const { service, chatModel, events } = harness;
		chatModel.enqueue(
			{ content: null, toolCalls: [{ id: "call_1", name: "log_mistake", arguments: mistakeArgs }] },
			{ content: "¿Y para beber?", toolCalls: [{ id: "call_2", name: "log_mistake", arguments: mistakeArgs }] }
		);

		const result = await service.sendMessage(sessionId, "Yo tener hambre");

		expect(result.reply.content).toBe("¿Y para beber?");
		expect(result.mistakes).toHaveLength(1);
		expect(chatModel.requests[2]?.messages.slice(3)).toEqual([
			{ role: "user", content: "Yo tener hambre" },
			{
				role: "assistant",
				content: null,
				toolCalls: [{ id: "call_1", name: "log_mistake", arguments: mistakeArgs }]
			},
			{ role: "tool", toolCallId: "call_1", content: "Mistake logged" },
			{ role: "user", content: FOLLOW_UP_INPUT }
		]);
		expect(events.at(-1)).toMatchObject({ type: "chat_turn_completed", followUp: true, toolCallCount: 2, latencyMs: 10 });
	});

	it("answers invalid tool arguments without logging them", async () => {
		const { service, chatModel, events } = harness;
		chatModel.enqueue({
			content: "Bien.",
			toolCalls: [{ id: "call_1", name: "log_mistake", arguments: { error_type: "grammar" } }]
		});

		const result = await service.sendMessage(sessionId, "Hola");

		expect(result.mistakes).toEqual([]);
		expect(events[0]).toMatchObject({
			type: "mistake_rejected",
			reason: "error_sentence is required; corrected_sentence is required"
		});
	});

	it("fails with EMPTY_RESPONSE and rolls back the user message", async () => {
		const { service, chatModel, events } = harness;
		chatModel.enqueue({ content: null }, { content: null });

		await expect(service.sendMessage(sessionId, "Hola")).rejects.toMatchObject({ code: "EMPTY_RESPONSE" });
		expect(service.getSession(sessionId).messages).toHaveLength(1);
		expect(events).toEqual([
			{
				type: "llm_request_failed",
				sessionId,
				errorCode: "EMPTY_RESPONSE",
				message: "The language model returned an empty reply",
				baseUrl: "https://api.openai.com/v1",
				timestamp: NOW.getTime()
			}
		]);
	});

	it("rolls back the user message when the model is unreachable", async () => {
		const { service, chatModel } = harness;
		chatModel.enqueue(new LlmTimeoutError(10));

		await expect(service.sendMessage(sessionId, "Hola")).rejects.toBeInstanceOf(LlmTimeoutError);
		expect(service.getSession(sessionId).messages.map((message) => message.role)).toEqual(["assistant"]);

		chatModel.enqueue({ content: "¿Sí?" });
		await service.sendMessage(sessionId, "Hola otra vez");
		expect(chatModel.requests.at(-1)?.messages.slice(3)).toEqual([{ role: "user", content: "Hola otra vez" }]);
	});

	it("stores no mistakes when the follow-up request fails", async () => {
		const { service, chatModel, store, events } = harness;
		chatModel.enqueue(
			{ content: null, toolCalls: [{ id: "call_1", name: "log_mistake", arguments: mistakeArgs }] },
			new LlmTimeoutError(10)
		);

		await expect(service.sendMessage(sessionId, "Yo tener hambre")).rejects.toBeInstanceOf(LlmTimeoutError);
		expect(await store.count()).toBe(0);
		expect(events.map((event) => event.type)).toEqual(["llm_request_failed"]);

		chatModel.enqueue({
			content: "(Note: Yo tener hambre → Yo tengo hambre) ¿Qué quiere comer?",
			toolCalls: [{ id: "call_2", name: "log_mistake", arguments: mistakeArgs }]
		});
		const retry = await service.sendMessage(sessionId, "Yo tener hambre");

		expect(retry.mistakes).toHaveLength(1);
		expect(await store.count()).toBe(1);
		expect(
			service.getSession(sessionId).messages.filter((message) => message.role === "user")
		).toHaveLength(1);
	});

	it("validates the message before calling the model", async () => {
		const { service, chatModel } = harness;

		await expect(service.sendMessage(sessionId, "   ")).rejects.toMatchObject({
			code: "VALIDATION_ERROR",
			message: "content cannot be blank"
		});
		await expect(service.sendMessage(sessionId, "x".repeat(2001))).rejects.toMatchObject({
			code: "VALIDATION_ERROR",
			message: "content must be at most 2000 characters"
		});
		expect(chatModel.requests).toHaveLength(1);
	});

	it("rejects unknown sessions", async () => {
		await expect(harness.service.sendMessage(uuid(99), "Hola")).rejects.toMatchObject({
			code: "SESSION_NOT_FOUND"
		});
	});
});

describe("TutorService history window", () => {
	it("sends only the most recent turns", async () => {
		const { service, chatModel } = createHarness({ sessions: new SessionStore({ historyTurnLimit: 1 }) });
		const { sessionId } = await service.startLesson(lessonConfig);
		chatModel.enqueue({ content: "Uno" }, { content: "Dos" });

		await service.sendMessage(sessionId, "primero");
		await service.sendMessage(sessionId, "segundo");

		expect(chatModel.requests[2]?.messages.slice(1)).toEqual([
			{ role: "user", content: "primero" },
			{ role: "assistant", content: "Uno" },
			{ role: "user", content: "segundo" }
		]);
	});
});

describe("TutorService.endLesson", () => {
	it("removes the session and records the number of turns", async () => {
		const { service, chatModel, events } = createHarness();
		const { sessionId } = await service.startLesson(lessonConfig);
		chatModel.enqueue({ content: "Vale" });
		await service.sendMessage(sessionId, "Una mesa, por favor");

		await service.endLesson(sessionId);

		expect(events.at(-1)).toEqual({ type: "lesson_ended", sessionId, turns: 1, timestamp: NOW.getTime() });
		expect(() => service.getSession(sessionId)).toThrow(/was not found/u);
		await expect(service.endLesson(sessionId)).rejects.toMatchObject({ code: "SESSION_NOT_FOUND" });
	});
});
