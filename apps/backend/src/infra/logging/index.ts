export {
	TutorEventLogger,
	createTutorEventLogger,
	sanitizeTutorEvent,
	TUTOR_EVENTS_FILE_NAME
} from "./tutor-event-logger.js";

export type {
	ChatTurnCompletedEvent,
	LessonEndedEvent,
	LessonStartedEvent,
	LlmRequestFailedEvent,
	MistakeLoggedEvent,
	MistakeRejectedEvent,
	MistakeStorageFailedEvent,
	MistakesClearedEvent,
	TutorEvent,
	TutorEventLoggerOptions,
	TutorEventRecorder,
	TutorEventWriter
} from "./tutor-event-logger.js";
