import { ErrorTypeSchema, MAX_LANGUAGE_LENGTH } from "@language-tutor/shared/tutor";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import type { FeedbackService } from "../../services/mistakes/feedback.service.js";
import { MAX_FEEDBACK_DAYS } from "../../services/mistakes/feedback.service.js";
import type { MistakeLogService } from "../../services/mistakes/mistake-log.service.js";
import { MAX_RECENT_LIMIT } from "../../services/mistakes/mistake-store.js";
import { sendFailure, sendSuccess } from "./http.js";

const targetLanguageSchema = z.string().trim().min(1).max(MAX_LANGUAGE_LENGTH).optional();

const listMistakesQuerySchema = z.object({
	limit: z.coerce.number().int().min(1).max(MAX_RECENT_LIMIT).optional(),
	targetLanguage: targetLanguageSchema,
	errorType: ErrorTypeSchema.optional(),
	sessionId: z.string().trim().min(1).optional()
});

const languageQuerySchema = z.object({
	targetLanguage: targetLanguageSchema
});

const feedbackQuerySchema = z.object({
	days: z.coerce.number().int().min(1).max(MAX_FEEDBACK_DAYS).optional(),
	targetLanguage: targetLanguageSchema,
	recentLimit: z.coerce.number().int().min(1).max(MAX_RECENT_LIMIT).optional()
});

export interface MistakeRoutesOptions {
	mistakeLog: MistakeLogService;
	feedbackService: FeedbackService;
	now: () => Date;
}

export async function registerMistakeRoutes(app: FastifyInstance, options: MistakeRoutesOptions): Promise<void> {
	const { mistakeLog, feedbackService, now } = options;

	// GET /api/mistakes - Most recent mistakes, newest first
	app.get("/api/mistakes", async (request: FastifyRequest, reply: FastifyReply) => {
		try {
			const query = listMistakesQuerySchema.parse(request.query ?? {});
			const mistakes = await mistakeLog.listRecent(query);
			return sendSuccess(reply, 200, { mistakes }, now);
		} catch (error) {
			return sendFailure(reply, error, now);
		}
	});

	// GET /api/mistakes/export - Every matching mistake as CSV
	app.get("/api/mistakes/export", async (request: FastifyRequest, reply: FastifyReply) => {
		try {
			const query = languageQuerySchema.parse(request.query ?? {});
			const csv = await mistakeLog.exportCsv(query);
			return reply
				.code(200)
				.header("content-type", "text/csv; charset=utf-8")
				.header("content-disposition", 'attachment; filename="mistakes.csv"')
				.send(csv);
		} catch (error) {
			return sendFailure(reply, error, now);
		}
	});

	// DELETE /api/mistakes - Clear the log, optionally for one language
	app.delete("/api/mistakes", async (request: FastifyRequest, reply: FastifyReply) => {
		try {
			const query = languageQuerySchema.parse(request.query ?? {});
			const deleted = await mistakeLog.clear(query);
			return sendSuccess(reply, 200, { deleted }, now);
		} catch (error) {
			return sendFailure(reply, error, now);
		}
	});

	// GET /api/feedback - Aggregated feedback for the period
	app.get("/api/feedback", async (request: FastifyRequest, reply: FastifyReply) => {
		try {
			const query = feedbackQuerySchema.parse(request.query ?? {});
			const summary = await feedbackService.summarize(query);
			return sendSuccess(reply, 200, summary, now);
		} catch (error) {
			return sendFailure(reply, error, now);
		}
	});
}
