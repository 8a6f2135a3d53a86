import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";

import {
	TUTOR_EVENTS_FILE_NAME,
	TutorEventLogger,
	sanitizeTutorEvent,
	type LlmRequestFailedEvent,
	type MistakeLoggedEvent,
	type TutorEvent
} from "../../src/infra/logging/index.js";

function createMistakeEvent(overrides: Partial<MistakeLoggedEvent> = {}): MistakeLoggedEvent {
	return {
		type: "mistake_logged",
		sessionId: "session-1",
		mistakeId: 1,
		errorType: "grammar",
		targetLanguage: "Spanish",
		errorSentence: "Yo tener hambre",
		correctedSentence: "Yo tengo hambre",
		timestamp: 1_715_000_000_000,
		...overrides
	};
}

describe("sanitizeTutorEvent", () => {
	it("reduces baseUrl to its hostname and drops secrets", () => {
		const event: LlmRequestFailedEvent & { apiKey: string } = {
			type: "llm_request_failed",
			sessionId: "session-1",
			errorCode: "LLM_REQUEST_FAILED",
			message: "Invalid API key. Check OPENAI_API_KEY.",
			baseUrl: "https://api.openai.com/v1",
			apiKey: "test-secret",
			timestamp: 1
		};

		const sanitized = sanitizeTutorEvent(event);

		expect("apiKey" in sanitized).toBe(false);
		expect(sanitized.baseUrl).toBe("api.openai.com");
		expect(event.baseUrl).toBe("https://api.openai.com/v1");
	});

	it("truncates long sentences to 200 characters", () => {
		const longSentence = "a".repeat(250);
		const sanitized = sanitizeTutorEvent(createMistakeEvent({ errorSentence: longSentence }));

		expect(sanitized.errorSentence).toHaveLength(200);
		expect(sanitized.errorSentence).toBe(`${"a".repeat(197)}...`);
		expect(sanitized.correctedSentence).toBe("Yo tengo hambre");
	});

	it("sanitizes nested objects", () => {
		const event: TutorEvent = {
			type: "mistake_storage_failed",
			sessionId: null,
			error: { name: "MistakeStoreError", message: "x".repeat(300) },
			timestamp: 1
		};

		const sanitized = sanitizeTutorEvent(event);

		expect(sanitized.type === "mistake_storage_failed" && sanitized.error.message.length).toBe(200);
	});
});

describe("TutorEventLogger", () => {
	it("requires a writer or a directory", () => {
		expect(() => new TutorEventLogger({})).toThrow(TypeError);
	});

	it("passes sanitized events to an injected writer", async () => {
		const writer = vi.fn();
		const logger = new TutorEventLogger({ writer });

		await logger.record(createMistakeEvent({ correctedSentence: "b".repeat(201) }));

		expect(writer).toHaveBeenCalledTimes(1);
		const [written] = writer.mock.calls[0] ?? [];
		expect(written).toMatchObject({ type: "mistake_logged", mistakeId: 1 });
		expect(written.correctedSentence).toHaveLength(200);
	});

	it("appends JSON lines to the events file", async () => {
		const directory = await mkdtemp(path.join(tmpdir(), "tutor-events-"));
		try {
			const logger = new TutorEventLogger({ logDirectory: path.join(directory, "nested") });
			await logger.record(createMistakeEvent());
			await logger.record({ type: "lesson_ended", sessionId: "session-1", turns: 3, timestamp: 2 });

			expect(logger.eventsFile).toBe(path.join(directory, "nested", TUTOR_EVENTS_FILE_NAME));
			const lines = (await readFile(path.join(directory, "nested", TUTOR_EVENTS_FILE_NAME), "utf-8"))
				.trim()
				.split("\n")
				.map((line) => JSON.parse(line));

			expect(lines).toHaveLength(2);
			expect(lines[0]).toMatchObject({ type: "mistake_logged", errorSentence: "Yo tener hambre" });
			expect(lines[1]).toEqual({ type: "lesson_ended", sessionId: "session-1", turns: 3, timestamp: 2 });
		} finally {
			await rm(directory, { recursive: true, force: true });
		}
	});

	it("warns instead of throwing when the writer fails", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const logger = new TutorEventLogger({
			writer: () => {
				throw new Error("disk full");
			}
		});

		await expect(logger.record(createMistakeEvent())).resolves.toBeUndefined();
		expect(warn).toHaveBeenCalledWith("Failed to record tutor event mistake_logged", expect.any(Error));
		warn.mockRestore();
	});
});
