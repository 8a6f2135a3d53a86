import type { HealthStatus } from "@language-tutor/shared/tutor";
import Fastify from "fastify";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import { loadTutorConfig, type TutorConfig } from "../../config/tutor.js";
import { createTutorEventLogger, type TutorEventRecorder } from "../../infra/logging/index.js";
import { openTutorDatabase } from "../../infra/storage/database.js";
import { ChatCompletionClient, type ChatModel } from "../../services/llm/chat-completion.client.js";
import { FeedbackService } from "../../services/mistakes/feedback.service.js";
import { MistakeLogService } from "../../services/mistakes/mistake-log.service.js";
import type { MistakeStore } from "../../services/mistakes/mistake-store.js";
import { SqliteMistakeStore } from "../../services/mistakes/sqlite-mistake-store.js";
import { SessionStore } from "../../services/tutor/session-store.js";
import { TutorService } from "../../services/tutor/tutor.service.js";
import { sendFailure, sendSuccess, toFailureResponse } from "./http.js";
import { registerLessonRoutes } from "./lesson.routes.js";
import { registerMistakeRoutes } from "./mistake.routes.js";

export interface TutorAppOptions {
	config?: TutorConfig;
	/** Defaults to a SQLite store at `config.databasePath`, closed with the app. */
	store?: MistakeStore;
	/** Defaults to an OpenAI-compatible client built from the config. */
	chatModel?: ChatModel;
	fetchImpl?: typeof fetch;
	/** Defaults to a JSONL file in `config.eventsDir`, else the Fastify logger. */
	eventRecorder?: TutorEventRecorder | null;
	sessions?: SessionStore;
	/** Overrides the Fastify logger otherwise configured from `config.logLevel`. */
	logger?: boolean;
	now?: () => Date;
	idGenerator?: () => string;
}

export async function createTutorApp(options: TutorAppOptions = {}): Promise<FastifyInstance> {
	const config = options.config ?? loadTutorConfig();
	const now = options.now ?? (() => new Date());

	const app = Fastify({ logger: options.logger ?? { level: config.logLevel } });

	const ownsStore = !options.store;
	const store = options.store ?? new SqliteMistakeStore(openTutorDatabase(config.databasePath));
	if (ownsStore) {
		app.addHook("onClose", async () => {
			store.close?.();
		});
	}

	const eventRecorder =
		options.eventRecorder !== undefined
			? options.eventRecorder
			: config.eventsDir
				? createTutorEventLogger({ logDirectory: config.eventsDir })
				: createTutorEventLogger({ writer: (event) => app.log.info({ event }, `tutor event ${event.type}`) });

	const chatModel =
		options.chatModel ??
		new ChatCompletionClient({
			apiKey: config.openaiApiKey,
			baseUrl: config.openaiBaseUrl,
			model: config.model,
			temperature: config.temperature,
			timeoutMs: config.requestTimeoutMs,
			fetchImpl: options.fetchImpl
		});

	const mistakeLog = new MistakeLogService({ store, eventRecorder, now });
	const feedbackService = new FeedbackService({ store, now });
	const tutorService = new TutorService({
		chatModel,
		mistakeLog,
		sessions:
			options.sessions ??
			new SessionStore({ maxSessions: config.maxSessions, historyTurnLimit: config.historyTurnLimit }),
		eventRecorder,
		baseUrl: config.openaiBaseUrl,
		now,
		idGenerator: options.idGenerator
	});

	app.setErrorHandler((error, _request, reply) => {
		const { status, body } = toFailureResponse(error, now);
		if (status >= 500) {
			app.log.error(error);
		}
		return reply.code(status).send(body);
	});

	app.get("/api/health", async (_request: FastifyRequest, reply: FastifyReply) => {
		try {
			const health: HealthStatus = {
				status: "ok",
				llmConfigured: chatModel.configured,
				model: chatModel.model,
				mistakeCount: await mistakeLog.count()
			};
			return sendSuccess(reply, 200, health, now);
		} catch (error) {
			return sendFailure(reply, error, now);
		}
	});

	await registerLessonRoutes(app, { tutorService, now });
	await registerMistakeRoutes(app, { mistakeLog, feedbackService, now });

	await app.ready();
	return app;
}
