import type {
  ChatMessage,
  FeedbackSummary,
  HealthStatus,
  LessonConfig,
  LessonSession,
  MistakeRecord
} from "@language-tutor/shared/tutor";
import { vi } from "vitest";
import type { Mock } from "vitest";

import type { TutorApi } from "../../src/api/tutorClient";

export const SESSION_ID = "6f1c2b9a-8d4e-4f6a-9b1c-2d3e4f5a6b7c";

export type FakeTutorApi = { [K in keyof TutorApi]: Mock<TutorApi[K]> };

export const buildConfig = (overrides: Partial<LessonConfig> = {}): LessonConfig => ({
  nativeLanguage: "English",
  learningLanguage: "Spanish",
  proficiencyLevel: "Beginner",
  scenario: "Restaurant",
  ...overrides
});

export const buildHealth = (overrides: Partial<HealthStatus> = {}): HealthStatus => ({
  status: "ok",
  llmConfigured: true,
  model: "gpt-4o-mini",
  mistakeCount: 0,
  ...overrides
});

export const buildMessage = (overrides: Partial<ChatMessage> = {}): ChatMessage => ({
  id: "message-1",
  role: "assistant",
  content: "¡Hola! ¿Qué desea pedir?",
  createdAt: "2024-05-10T12:00:00.000Z",
  ...overrides
});

export const buildSession = (overrides: Partial<LessonSession> = {}): LessonSession => ({
  sessionId: SESSION_ID,
  config: buildConfig(),
  messages: [buildMessage()],
  startedAt: "2024-05-10T12:00:00.000Z",
  ...overrides
});

export const buildMistake = (overrides: Partial<MistakeRecord> = {}): MistakeRecord => ({
  id: 1,
  timestamp: "2024-05-10T12:01:00.000Z",
  sessionId: SESSION_ID,
  nativeLanguage: "English",
  targetLanguage: "Spanish",
  errorSentence: "Yo quiero un agua",
  correctedSentence: "Quiero agua",
  errorType: "grammar",
  ...overrides
});

export const buildSummary = (overrides: Partial<FeedbackSummary> = {}): FeedbackSummary => ({
  window: { from: "2024-05-04T00:00:00.000Z", to: "2024-05-10T12:00:00.000Z", days: 7 },
  targetLanguage: null,
  totalMistakes: 3,
  byErrorType: [
    { errorType: "grammar", count: 2, share: 0.6667 },
    { errorType: "vocabulary", count: 1, share: 0.3333 },
    { errorType: "pronunciation", count: 0, share: 0 },
    { errorType: "syntax", count: 0, share: 0 },
    { errorType: "other", count: 0, share: 0 }
  ],
  byLanguage: [
    { targetLanguage: "Spanish", count: 2 },
    { targetLanguage: "French", count: 1 }
  ],
  dailyTrend: [
    { date: "2024-05-09", total: 1, grammar: 1, vocabulary: 0, pronunciation: 0, syntax: 0, other: 0 },
    { date: "2024-05-10", total: 2, grammar: 1, vocabulary: 1, pronunciation: 0, syntax: 0, other: 0 }
  ],
  recurringMistakes: [
    {
      errorSentence: "Yo quiero un agua",
      correctedSentence: "Quiero agua",
      errorType: "grammar",
      occurrences: 2,
      lastSeenAt: "2024-05-10T12:01:00.000Z"
    }
  ],
  recentMistakes: [buildMistake()],
  topErrorType: "grammar",
  highlights: ["3 mistakes logged in the last 7 days.", "Most common: grammar (67% of mistakes)."],
  ...overrides
});

export function createFakeClient(): FakeTutorApi {
  return {
    getHealth: vi.fn<TutorApi["getHealth"]>().mockResolvedValue(buildHealth()),
    startLesson: vi.fn<TutorApi["startLesson"]>(),
    sendMessage: vi.fn<TutorApi["sendMessage"]>(),
    endLesson: vi.fn<TutorApi["endLesson"]>().mockResolvedValue(undefined),
    listMistakes: vi.fn<TutorApi["listMistakes"]>().mockResolvedValue([]),
    clearMistakes: vi.fn<TutorApi["clearMistakes"]>().mockResolvedValue(0),
    getFeedback: vi.fn<TutorApi["getFeedback"]>(),
    exportUrl: vi.fn<TutorApi["exportUrl"]>((targetLanguage) =>
      targetLanguage ? `/api/mistakes/export?targetLanguage=${targetLanguage}` : "/api/mistakes/export"
    )
  };
}
