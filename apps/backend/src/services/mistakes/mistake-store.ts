import type { ErrorType, MistakeDraft, MistakeRecord } from "@language-tutor/shared/tutor";

export const DEFAULT_RECENT_LIMIT = 10;
export const MAX_RECENT_LIMIT = 100;

export interface MistakeFilter {
	targetLanguage?: string;
	errorType?: ErrorType;
	sessionId?: string;
}

export interface ListRecentOptions extends MistakeFilter {
	limit?: number;
}

/**
 * Persistence for logged mistakes. Listing methods return validated
 * {@link MistakeRecord}s; `listRecent` is newest first, the others oldest first.
 */
export interface MistakeStore {
	record(draft: MistakeDraft): Promise<MistakeRecord>;
	listRecent(options?: ListRecentOptions): Promise<MistakeRecord[]>;
	listBetween(from: Date, to: Date, filter?: MistakeFilter): Promise<MistakeRecord[]>;
	listAll(filter?: MistakeFilter): Promise<MistakeRecord[]>;
	count(filter?: MistakeFilter): Promise<number>;
	clear(filter?: MistakeFilter): Promise<number>;
	close?(): void;
}

export class MistakeStoreError extends Error {
	readonly code = "STORAGE_ERROR" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "MistakeStoreError";
	}
}

export function clampRecentLimit(limit: number | undefined): number {
	if (limit === undefined || !Number.isFinite(limit)) {
		return DEFAULT_RECENT_LIMIT;
	}

	return Math.min(MAX_RECENT_LIMIT, Math.max(1, Math.trunc(limit)));
}
