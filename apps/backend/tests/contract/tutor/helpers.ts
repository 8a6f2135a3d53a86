import type { FastifyInstance } from "fastify";
import { vi, type Mock } from "vitest";

import { createTutorApp } from "../../../src/api/tutor/index.js";
import { loadTutorConfig } from "../../../src/config/tutor.js";
import type { TutorEvent } from "../../../src/infra/logging/index.js";
import { InMemoryMistakeStore } from "../../../src/services/mistakes/in-memory-mistake-store.js";
import type { MistakeStore } from "../../../src/services/mistakes/mistake-store.js";
import { createCompletionBody, jsonResponse } from "../../helpers/chat-completions.js";

export const FIXED_NOW = new Date("2024-05-10T12:00:00.000Z");

export interface TutorTestHarness {
	app: FastifyInstance;
	store: MistakeStore;
	events: TutorEvent[];
	fetchMock: Mock<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>;
	/** Queues chat completion responses, answered in order. */
	queueCompletions(...responses: Array<Record<string, unknown> | Response | Error>): void;
	close(): Promise<void>;
}

export interface TutorTestHarnessOptions {
	apiKey?: string | null;
	store?: MistakeStore;
}

export async function createTutorTestHarness(options: TutorTestHarnessOptions = {}): Promise<TutorTestHarness> {
	const queue: Array<Record<string, unknown> | Response | Error> = [];
	const events: TutorEvent[] = [];
	const store = options.store ?? new InMemoryMistakeStore();

	const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
		const next = queue.shift() ?? createCompletionBody({ content: "Vale." });
		if (next instanceof Error) {
			throw next;
		}
		return next instanceof Response ? next : jsonResponse(next);
	});

	const apiKey = options.apiKey === undefined ? "test-secret" : options.apiKey;
	const config = loadTutorConfig(apiKey ? { OPENAI_API_KEY: apiKey } : {});

	const app = await createTutorApp({
		config,
		store,
		fetchImpl: fetchMock,
		eventRecorder: {
			record: async (event) => {
				events.push(event);
			}
		},
		logger: false,
		now: () => FIXED_NOW
	});

	return {
		app,
		store,
		events,
		fetchMock,
		queueCompletions: (...responses) => {
			queue.push(...responses);
		},
		close: async () => {
			await app.close();
		}
	};
}

export const VALID_LESSON = {
	nativeLanguage: "English",
	learningLanguage: "Spanish",
	proficiencyLevel: "Beginner",
	scenario: "Restaurant"
} as const;
