export const CREATE_MISTAKES_TABLE = `
CREATE TABLE IF NOT EXISTS mistakes (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	timestamp TEXT NOT NULL,
	session_id TEXT,
	native_language TEXT NOT NULL,
	target_language TEXT NOT NULL,
	error_sentence TEXT NOT NULL,
	corrected_sentence TEXT NOT NULL,
	error_type TEXT NOT NULL
)`;

export const CREATE_MISTAKES_TIMESTAMP_INDEX = `
CREATE INDEX IF NOT EXISTS idx_mistakes_timestamp ON mistakes (timestamp)`;

export const ALL_CREATE_STATEMENTS = [CREATE_MISTAKES_TABLE, CREATE_MISTAKES_TIMESTAMP_INDEX] as const;

/**
 * Databases written by earlier releases have no session column and keep
 * `CURRENT_TIMESTAMP` values (`YYYY-MM-DD HH:MM:SS`, UTC).
 */
export const ADD_SESSION_ID_COLUMN = "ALTER TABLE mistakes ADD COLUMN session_id TEXT";

export const NORMALIZE_LEGACY_TIMESTAMPS = `
UPDATE mistakes
SET timestamp = replace(timestamp, ' ', 'T') || '.000Z'
WHERE timestamp LIKE '____-__-__ __:__:__'`;
