import Database from "better-sqlite3";

import {
	ADD_SESSION_ID_COLUMN,
	ALL_CREATE_STATEMENTS,
	NORMALIZE_LEGACY_TIMESTAMPS
} from "./schema.js";

export type TutorDatabase = Database.Database;

export const IN_MEMORY_DATABASE = ":memory:" as const;

/** Unicode-aware lower-casing; SQLite's `lower()` and `NOCASE` fold ASCII only. */
export const UNICODE_LOWER_FUNCTION = "unicode_lower";

interface ColumnInfoRow {
	name: string;
}

/**
 * Opens (or creates) the mistakes database and brings its schema up to date.
 */
export function openTutorDatabase(filename: string = IN_MEMORY_DATABASE): TutorDatabase {
	const db = new Database(filename);
	if (filename !== IN_MEMORY_DATABASE) {
		db.pragma("journal_mode = WAL");
	}

	registerTutorFunctions(db);
	migrateTutorDatabase(db);
	return db;
}

export function registerTutorFunctions(db: TutorDatabase): void {
	db.function(UNICODE_LOWER_FUNCTION, { deterministic: true }, (value: unknown) =>
		typeof value === "string" ? value.toLowerCase() : null
	);
}

export function migrateTutorDatabase(db: TutorDatabase): void {
	const migrate = db.transaction(() => {
		for (const statement of ALL_CREATE_STATEMENTS) {
			db.exec(statement);
		}

		const columns = db.prepare<[], ColumnInfoRow>("PRAGMA table_info(mistakes)").all();
		if (!columns.some((column) => column.name === "session_id")) {
			db.exec(ADD_SESSION_ID_COLUMN);
		}

		db.exec(NORMALIZE_LEGACY_TIMESTAMPS);
	});

	migrate();
}
