import {
	MistakeRecordSchema,
	type MistakeDraft,
	type MistakeRecord
} from "@language-tutor/shared/tutor";

import {
	clampRecentLimit,
	type ListRecentOptions,
	type MistakeFilter,
	type MistakeStore
} from "./mistake-store.js";

/**
 * Array-backed {@link MistakeStore} with the same ordering and filtering rules
 * as the SQLite store.
 */
export class InMemoryMistakeStore implements MistakeStore {
	private mistakes: MistakeRecord[] = [];
	private nextId = 1;

	record(draft: MistakeDraft): Promise<MistakeRecord> {
		const record = MistakeRecordSchema.parse({ ...draft, id: this.nextId });
		this.nextId += 1;
		this.mistakes.push(record);
		return Promise.resolve({ ...record });
	}

	listRecent(options: ListRecentOptions = {}): Promise<MistakeRecord[]> {
		const limit = clampRecentLimit(options.limit);
		const matching = this.filter(options).sort(compareDescending).slice(0, limit);
		return Promise.resolve(matching);
	}

	listBetween(from: Date, to: Date, filter: MistakeFilter = {}): Promise<MistakeRecord[]> {
		const fromIso = from.toISOString();
		const toIso = to.toISOString();
		const matching = this.filter(filter)
			.filter((mistake) => mistake.timestamp >= fromIso && mistake.timestamp <= toIso)
			.sort(compareAscending);
		return Promise.resolve(matching);
	}

	listAll(filter: MistakeFilter = {}): Promise<MistakeRecord[]> {
		return Promise.resolve(this.filter(filter).sort(compareAscending));
	}

	count(filter: MistakeFilter = {}): Promise<number> {
		return Promise.resolve(this.filter(filter).length);
	}

	clear(filter: MistakeFilter = {}): Promise<number> {
		const removed = new Set(this.filter(filter).map((mistake) => mistake.id));
		this.mistakes = this.mistakes.filter((mistake) => !removed.has(mistake.id));
		return Promise.resolve(removed.size);
	}

	private filter(filter: MistakeFilter): MistakeRecord[] {
		const language = filter.targetLanguage?.trim().toLowerCase();
		return this.mistakes
			.filter((mistake) => !language || mistake.targetLanguage.toLowerCase() === language)
			.filter((mistake) => !filter.errorType || mistake.errorType === filter.errorType)
			.filter((mistake) => !filter.sessionId || mistake.sessionId === filter.sessionId)
			.map((mistake) => ({ ...mistake }));
	}
}

function compareAscending(a: MistakeRecord, b: MistakeRecord): number {
	if (a.timestamp !== b.timestamp) {
		return a.timestamp < b.timestamp ? -1 : 1;
	}
	return a.id - b.id;
}

function compareDescending(a: MistakeRecord, b: MistakeRecord): number {
	return compareAscending(b, a);
}
