import { ChatInputSchema } from "@language-tutor/shared/tutor";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import type { TutorService } from "../../services/tutor/tutor.service.js";
import { sendFailure, sendSuccess } from "./http.js";

const startLessonRequestSchema = z.object(
	{
		config: z.record(z.string(), z.unknown(), { required_error: "config is required" })
	},
	{ required_error: "Request body is required" }
);

const sendMessageRequestSchema = z.object(
	{ content: ChatInputSchema.shape.content },
	{ required_error: "Request body is required" }
);

interface SessionParams {
	sessionId: string;
}

export interface LessonRoutesOptions {
	tutorService: TutorService;
	now: () => Date;
}

export async function registerLessonRoutes(app: FastifyInstance, options: LessonRoutesOptions): Promise<void> {
	const { tutorService, now } = options;

	// POST /api/lessons - Start a lesson with a fresh session
	app.post("/api/lessons", async (request: FastifyRequest, reply: FastifyReply) => {
		try {
			const body = startLessonRequestSchema.parse(request.body);
			const session = await tutorService.startLesson(body.config);
			return sendSuccess(reply, 201, session, now);
		} catch (error) {
			return sendFailure(reply, error, now);
		}
	});

	// GET /api/lessons/:sessionId - Current transcript of a lesson
	app.get(
		"/api/lessons/:sessionId",
		async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
			try {
				return sendSuccess(reply, 200, tutorService.getSession(request.params.sessionId), now);
			} catch (error) {
				return sendFailure(reply, error, now);
			}
		}
	);

	// DELETE /api/lessons/:sessionId - End a lesson
	app.delete(
		"/api/lessons/:sessionId",
		async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
			try {
				await tutorService.endLesson(request.params.sessionId);
				return sendSuccess(reply, 200, { ended: true }, now);
			} catch (error) {
				return sendFailure(reply, error, now);
			}
		}
	);

	// POST /api/lessons/:sessionId/messages - One chat turn
	app.post(
		"/api/lessons/:sessionId/messages",
		async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
			try {
				const body = sendMessageRequestSchema.parse(request.body);
				const result = await tutorService.sendMessage(request.params.sessionId, body.content);
				return sendSuccess(reply, 200, result, now);
			} catch (error) {
				return sendFailure(reply, error, now);
			}
		}
	);
}
