export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type TutorLogLevel = (typeof LOG_LEVELS)[number];

export interface TutorConfig {
	openaiApiKey: string | null;
	openaiBaseUrl: string;
	model: string;
	temperature: number;
	requestTimeoutMs: number;
	databasePath: string;
	host: string;
	port: number;
	logLevel: TutorLogLevel;
	eventsDir: string | null;
	historyTurnLimit: number;
	maxSessions: number;
}

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.2;
const MAX_TEMPERATURE = 2;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_DATABASE_PATH = "language_errors.db";
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 8501;
const DEFAULT_LOG_LEVEL: TutorLogLevel = "info";
const DEFAULT_HISTORY_TURNS = 20;
const DEFAULT_MAX_SESSIONS = 100;

function parsePositiveInt(envValue: string | undefined, fallback: number): number {
	if (!envValue) {
		return fallback;
	}

	const parsed = Number(envValue);
	return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function parseTemperature(envValue: string | undefined): number {
	if (!envValue || envValue.trim().length === 0) {
		return DEFAULT_TEMPERATURE;
	}

	const parsed = Number(envValue);
	return Number.isFinite(parsed) && parsed >= 0 && parsed <= MAX_TEMPERATURE ? parsed : DEFAULT_TEMPERATURE;
}

function parseLogLevel(envValue: string | undefined): TutorLogLevel {
	const candidate = envValue?.trim().toLowerCase();
	return LOG_LEVELS.find((level) => level === candidate) ?? DEFAULT_LOG_LEVEL;
}

function readString(envValue: string | undefined): string | null {
	const trimmed = envValue?.trim();
	return trimmed ? trimmed : null;
}

export function loadTutorConfig(env: NodeJS.ProcessEnv = process.env): TutorConfig {
	return {
		openaiApiKey: readString(env.OPENAI_API_KEY),
		openaiBaseUrl: (readString(env.OPENAI_BASE_URL) ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/u, ""),
		model: readString(env.TUTOR_MODEL) ?? DEFAULT_MODEL,
		temperature: parseTemperature(env.TUTOR_TEMPERATURE),
		requestTimeoutMs: parsePositiveInt(env.TUTOR_REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
		databasePath: readString(env.TUTOR_DB_PATH) ?? DEFAULT_DATABASE_PATH,
		host: readString(env.TUTOR_HOST) ?? DEFAULT_HOST,
		port: parsePositiveInt(env.TUTOR_PORT, DEFAULT_PORT),
		logLevel: parseLogLevel(env.TUTOR_LOG_LEVEL),
		eventsDir: readString(env.TUTOR_EVENTS_DIR),
		historyTurnLimit: parsePositiveInt(env.TUTOR_HISTORY_TURNS, DEFAULT_HISTORY_TURNS),
		maxSessions: parsePositiveInt(env.TUTOR_MAX_SESSIONS, DEFAULT_MAX_SESSIONS)
	};
}
