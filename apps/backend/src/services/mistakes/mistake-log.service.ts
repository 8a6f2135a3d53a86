import {
	LogMistakeArgsSchema,
	normalizeErrorType,
	type LessonConfig,
	type MistakeDraft,
	type MistakeRecord
} from "@language-tutor/shared/tutor";

import type { TutorEvent, TutorEventRecorder } from "../../infra/logging/tutor-event-logger.js";
import type { ListRecentOptions, MistakeFilter, MistakeStore } from "./mistake-store.js";

export interface MistakeLogContext {
	sessionId: string | null;
	config: Pick<LessonConfig, "nativeLanguage" | "learningLanguage">;
}

/** A validated mistake that has not been stored yet. */
export type PendingMistake = Omit<MistakeDraft, "timestamp" | "sessionId">;

export type MistakeValidation =
	| { status: "accepted"; mistake: PendingMistake }
	| { status: "rejected"; reason: string };

export type PersistOutcome =
	| { status: "logged"; mistake: MistakeRecord }
	| { status: "failed"; error: Error };

export type MistakeLogOutcome = PersistOutcome | { status: "rejected"; reason: string };

export interface MistakeLogServiceOptions {
	store: MistakeStore;
	eventRecorder?: TutorEventRecorder | null;
	now?: () => Date;
}

const CSV_COLUMNS = [
	"id",
	"timestamp",
	"session_id",
	"native_language",
	"target_language",
	"error_sentence",
	"corrected_sentence",
	"error_type"
] as const;

export class MistakeLogService {
	private readonly store: MistakeStore;
	private readonly eventRecorder: TutorEventRecorder | null;
	private readonly now: () => Date;

	constructor(options: MistakeLogServiceOptions) {
		this.store = options.store;
		this.eventRecorder = options.eventRecorder ?? null;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Persists the arguments of a `log_mistake` tool call. Never throws: a bad
	 * payload or a storage failure is reported in the outcome and as an event.
	 */
	async logFromToolCall(args: Record<string, unknown>, context: MistakeLogContext): Promise<MistakeLogOutcome> {
		const validation = await this.validateToolCall(args, context);
		if (validation.status === "rejected") {
			return validation;
		}
		return this.persist(validation.mistake, context.sessionId);
	}

	/**
	 * Checks the arguments of a `log_mistake` tool call and resolves the
	 * languages against the lesson, without storing anything.
	 */
	async validateToolCall(args: Record<string, unknown>, context: MistakeLogContext): Promise<MistakeValidation> {
		const parsed = LogMistakeArgsSchema.safeParse(args);
		if (!parsed.success) {
			const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
			await this.recordEvent({
				type: "mistake_rejected",
				sessionId: context.sessionId,
				reason,
				timestamp: this.now().getTime()
			});
			return { status: "rejected", reason };
		}

		const payload = parsed.data;
		return {
			status: "accepted",
			mistake: {
				nativeLanguage: payload.native_lang || context.config.nativeLanguage,
				targetLanguage: payload.target_lang || context.config.learningLanguage,
				errorSentence: payload.error_sentence,
				correctedSentence: payload.corrected_sentence,
				errorType: normalizeErrorType(payload.error_type)
			}
		};
	}

	/** Stores a validated mistake, stamped with the current time. Never throws. */
	async persist(pending: PendingMistake, sessionId: string | null): Promise<PersistOutcome> {
		try {
			const mistake = await this.store.record({
				...pending,
				timestamp: this.now().toISOString(),
				sessionId
			});

			await this.recordEvent({
				type: "mistake_logged",
				sessionId,
				mistakeId: mistake.id,
				errorType: mistake.errorType,
				targetLanguage: mistake.targetLanguage,
				errorSentence: mistake.errorSentence,
				correctedSentence: mistake.correctedSentence,
				timestamp: this.now().getTime()
			});
			return { status: "logged", mistake };
		} catch (unknownError: unknown) {
			const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));
			await this.recordEvent({
				type: "mistake_storage_failed",
				sessionId,
				error: { name: error.name, message: error.message },
				timestamp: this.now().getTime()
			});
			return { status: "failed", error };
		}
	}

	listRecent(options: ListRecentOptions = {}): Promise<MistakeRecord[]> {
		return this.store.listRecent(options);
	}

	count(filter: MistakeFilter = {}): Promise<number> {
		return this.store.count(filter);
	}

	async clear(filter: MistakeFilter = {}): Promise<number> {
		const deleted = await this.store.clear(filter);
		await this.recordEvent({
			type: "mistakes_cleared",
			targetLanguage: filter.targetLanguage ?? null,
			deleted,
			timestamp: this.now().getTime()
		});
		return deleted;
	}

	async exportCsv(filter: MistakeFilter = {}): Promise<string> {
		const mistakes = await this.store.listAll(filter);
		const lines = [
			CSV_COLUMNS.join(","),
			...mistakes.map((mistake) =>
				[
					String(mistake.id),
					mistake.timestamp,
					mistake.sessionId ?? "",
					mistake.nativeLanguage,
					mistake.targetLanguage,
					mistake.errorSentence,
					mistake.correctedSentence,
					mistake.errorType
				]
					.map(escapeCsvField)
					.join(",")
			)
		];
		return `${lines.join("\r\n")}\r\n`;
	}

	private async recordEvent(event: TutorEvent): Promise<void> {
		if (!this.eventRecorder) {
			return;
		}
		await this.eventRecorder.record(event);
	}
}

export function escapeCsvField(value: string): string {
	if (!/[",\r\n]/u.test(value)) {
		return value;
	}
	return `"${value.replace(/"/gu, '""')}"`;
}
