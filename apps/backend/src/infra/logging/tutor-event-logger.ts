import type { ErrorType, ProficiencyLevel, Scenario } from "@language-tutor/shared/tutor";
import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

const DEFAULT_FILE_NAME = "tutor-events.jsonl" as const;
export const TUTOR_EVENTS_FILE_NAME = DEFAULT_FILE_NAME;
const DIRECTORY_MODE = 0o700;
const MAX_TEXT_LENGTH = 200;
const TRUNCATION_SUFFIX = "..." as const;

const OMITTED_KEYS = new Set(["apiKey", "authorization"]);
const HOSTNAME_KEYS = new Set(["baseUrl"]);
const TRUNCATED_KEYS = new Set(["errorSentence", "correctedSentence", "message", "content"]);

export interface LessonStartedEvent {
	type: "lesson_started";
	sessionId: string;
	nativeLanguage: string;
	learningLanguage: string;
	proficiencyLevel: ProficiencyLevel;
	scenario: Scenario;
	timestamp: number;
}

export interface LessonEndedEvent {
	type: "lesson_ended";
	sessionId: string;
	turns: number;
	timestamp: number;
}

export interface ChatTurnCompletedEvent {
	type: "chat_turn_completed";
	sessionId: string;
	latencyMs: number;
	toolCallCount: number;
	mistakesLogged: number;
	followUp: boolean;
	timestamp: number;
}

export interface MistakeLoggedEvent {
	type: "mistake_logged";
	sessionId: string | null;
	mistakeId: number;
	errorType: ErrorType;
	targetLanguage: string;
	errorSentence: string;
	correctedSentence: string;
	timestamp: number;
}

export interface MistakeRejectedEvent {
	type: "mistake_rejected";
	sessionId: string | null;
	reason: string;
	timestamp: number;
}

export interface MistakeStorageFailedEvent {
	type: "mistake_storage_failed";
	sessionId: string | null;
	error: {
		name: string;
		message: string;
	};
	timestamp: number;
}

export interface MistakesClearedEvent {
	type: "mistakes_cleared";
	targetLanguage: string | null;
	deleted: number;
	timestamp: number;
}

export interface LlmRequestFailedEvent {
	type: "llm_request_failed";
	sessionId: string;
	errorCode: string;
	message: string;
	baseUrl?: string;
	timestamp: number;
}

export type TutorEvent =
	| LessonStartedEvent
	| LessonEndedEvent
	| ChatTurnCompletedEvent
	| MistakeLoggedEvent
	| MistakeRejectedEvent
	| MistakeStorageFailedEvent
	| MistakesClearedEvent
	| LlmRequestFailedEvent;

export type TutorEventWriter = (event: TutorEvent) => Promise<void> | void;

/** Anything that can take a tutor event; services depend on this rather than the class. */
export interface TutorEventRecorder {
	record(event: TutorEvent): Promise<void>;
}

export interface TutorEventLoggerOptions {
	writer?: TutorEventWriter;
	logDirectory?: string;
	fileName?: string;
}

export class TutorEventLogger implements TutorEventRecorder {
	private readonly write: TutorEventWriter;
	private readonly filePath: string | null = null;
	private readonly directory: string | null = null;
	private ensuredDirectory = false;

	constructor(options: TutorEventLoggerOptions) {
		if (options.writer) {
			this.write = options.writer;
			return;
		}

		if (!options.logDirectory) {
			throw new TypeError("TutorEventLogger requires either a writer or logDirectory");
		}

		const directory = options.logDirectory;
		const filePath = path.join(directory, options.fileName ?? DEFAULT_FILE_NAME);
		this.directory = directory;
		this.filePath = filePath;
		this.write = async (event) => {
			await this.ensureDirectory();
			await appendFile(filePath, `${JSON.stringify(event)}\n`, "utf-8");
		};
	}

	get eventsFile(): string | null {
		return this.filePath;
	}

	async record(event: TutorEvent): Promise<void> {
		try {
			await this.write(sanitizeTutorEvent(event));
		} catch (error) {
			console.warn(`Failed to record tutor event ${event.type}`, error);
		}
	}

	private async ensureDirectory(): Promise<void> {
		if (this.ensuredDirectory || !this.directory) {
			return;
		}

		await mkdir(this.directory, { recursive: true, mode: DIRECTORY_MODE });
		this.ensuredDirectory = true;
	}
}

export function createTutorEventLogger(options: TutorEventLoggerOptions): TutorEventLogger {
	return new TutorEventLogger(options);
}

export function sanitizeTutorEvent<T extends TutorEvent>(event: T): T {
	return sanitizeRecord(event);
}

function sanitizeRecord<T extends object>(value: T): T {
	const result: Record<string, unknown> = {};

	for (const [key, innerValue] of Object.entries(value)) {
		if (OMITTED_KEYS.has(key)) {
			continue;
		}

		if (typeof innerValue === "string" && HOSTNAME_KEYS.has(key)) {
			result[key] = extractHostname(innerValue);
			continue;
		}

		if (typeof innerValue === "string" && TRUNCATED_KEYS.has(key)) {
			result[key] = truncateText(innerValue);
			continue;
		}

		result[key] = isPlainObject(innerValue) ? sanitizeRecord(innerValue) : innerValue;
	}

	return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractHostname(candidate: string): string {
	const trimmed = candidate.trim();
	if (trimmed.length === 0) {
		return trimmed;
	}

	try {
		return new URL(/^\w+:\/\//u.test(trimmed) ? trimmed : `https://${trimmed}`).hostname;
	} catch {
		return trimmed.replace(/^\w+:\/\//u, "").split(/[/?#:]/u)[0] ?? "";
	}
}

function truncateText(value: string): string {
	if (value.length <= MAX_TEXT_LENGTH) {
		return value;
	}

	return `${value.slice(0, MAX_TEXT_LENGTH - TRUNCATION_SUFFIX.length)}${TRUNCATION_SUFFIX}`;
}
