import {
	MistakeRecordSchema,
	normalizeErrorType,
	type MistakeDraft,
	type MistakeRecord
} from "@language-tutor/shared/tutor";

import { UNICODE_LOWER_FUNCTION, type TutorDatabase } from "../../infra/storage/database.js";
import {
	MistakeStoreError,
	clampRecentLimit,
	type ListRecentOptions,
	type MistakeFilter,
	type MistakeStore
} from "./mistake-store.js";

interface MistakeRow {
	id: number;
	timestamp: string;
	session_id: string | null;
	native_language: string | null;
	target_language: string | null;
	error_sentence: string | null;
	corrected_sentence: string | null;
	error_type: string | null;
}

type SqlValue = string | number | null;

interface WhereClause {
	sql: string;
	values: SqlValue[];
}

const SELECT_COLUMNS =
	"id, timestamp, session_id, native_language, target_language, error_sentence, corrected_sentence, error_type";

/**
 * {@link MistakeStore} over the `mistakes` table. Language filters call
 * `unicode_lower`, so the database must come from `openTutorDatabase` or have
 * had `registerTutorFunctions` applied.
 */
export class SqliteMistakeStore implements MistakeStore {
	constructor(private readonly db: TutorDatabase) {}

	record(draft: MistakeDraft): Promise<MistakeRecord> {
		return this.execute("record mistake", () => {
			const result = this.db
				.prepare<SqlValue[]>(
					`INSERT INTO mistakes
					(timestamp, session_id, native_language, target_language, error_sentence, corrected_sentence, error_type)
					VALUES (?, ?, ?, ?, ?, ?, ?)`
				)
				.run(
					draft.timestamp,
					draft.sessionId ?? null,
					draft.nativeLanguage,
					draft.targetLanguage,
					draft.errorSentence,
					draft.correctedSentence,
					draft.errorType
				);

			return MistakeRecordSchema.parse({ ...draft, id: Number(result.lastInsertRowid) });
		});
	}

	listRecent(options: ListRecentOptions = {}): Promise<MistakeRecord[]> {
		return this.execute("list recent mistakes", () => {
			const where = buildWhere(options);
			const rows = this.db
				.prepare<SqlValue[], MistakeRow>(
					`SELECT ${SELECT_COLUMNS} FROM mistakes${where.sql} ORDER BY timestamp DESC, id DESC LIMIT ?`
				)
				.all(...where.values, clampRecentLimit(options.limit));
			return rows.map(mapRow);
		});
	}

	listBetween(from: Date, to: Date, filter: MistakeFilter = {}): Promise<MistakeRecord[]> {
		return this.execute("list mistakes in range", () => {
			const where = buildWhere(filter, [
				{ sql: "timestamp >= ?", values: [from.toISOString()] },
				{ sql: "timestamp <= ?", values: [to.toISOString()] }
			]);
			const rows = this.db
				.prepare<SqlValue[], MistakeRow>(
					`SELECT ${SELECT_COLUMNS} FROM mistakes${where.sql} ORDER BY timestamp ASC, id ASC`
				)
				.all(...where.values);
			return rows.map(mapRow);
		});
	}

	listAll(filter: MistakeFilter = {}): Promise<MistakeRecord[]> {
		return this.execute("list mistakes", () => {
			const where = buildWhere(filter);
			const rows = this.db
				.prepare<SqlValue[], MistakeRow>(
					`SELECT ${SELECT_COLUMNS} FROM mistakes${where.sql} ORDER BY timestamp ASC, id ASC`
				)
				.all(...where.values);
			return rows.map(mapRow);
		});
	}

	count(filter: MistakeFilter = {}): Promise<number> {
		return this.execute("count mistakes", () => {
			const where = buildWhere(filter);
			const row = this.db
				.prepare<SqlValue[], { total: number }>(`SELECT COUNT(*) AS total FROM mistakes${where.sql}`)
				.get(...where.values);
			return row?.total ?? 0;
		});
	}

	clear(filter: MistakeFilter = {}): Promise<number> {
		return this.execute("clear mistakes", () => {
			const where = buildWhere(filter);
			const result = this.db.prepare<SqlValue[]>(`DELETE FROM mistakes${where.sql}`).run(...where.values);
			return result.changes;
		});
	}

	close(): void {
		if (this.db.open) {
			this.db.close();
		}
	}

	private execute<T>(operation: string, work: () => T): Promise<T> {
		try {
			return Promise.resolve(work());
		} catch (error) {
			return Promise.reject(new MistakeStoreError(`Failed to ${operation}`, { cause: error }));
		}
	}
}

function buildWhere(filter: MistakeFilter, extra: WhereClause[] = []): WhereClause {
	const clauses: WhereClause[] = [...extra];

	if (filter.targetLanguage) {
		clauses.push({
			sql: `${UNICODE_LOWER_FUNCTION}(target_language) = ?`,
			values: [filter.targetLanguage.trim().toLowerCase()]
		});
	}

	if (filter.errorType) {
		clauses.push({ sql: "error_type = ?", values: [filter.errorType] });
	}

	if (filter.sessionId) {
		clauses.push({ sql: "session_id = ?", values: [filter.sessionId] });
	}

	if (clauses.length === 0) {
		return { sql: "", values: [] };
	}

	return {
		sql: ` WHERE ${clauses.map((clause) => clause.sql).join(" AND ")}`,
		values: clauses.flatMap((clause) => clause.values)
	};
}

function mapRow(row: MistakeRow): MistakeRecord {
	return MistakeRecordSchema.parse({
		id: row.id,
		timestamp: row.timestamp,
		sessionId: row.session_id,
		nativeLanguage: row.native_language ?? "",
		targetLanguage: row.target_language ?? "",
		errorSentence: row.error_sentence ?? "",
		correctedSentence: row.corrected_sentence ?? "",
		errorType: normalizeErrorType(row.error_type)
	});
}
