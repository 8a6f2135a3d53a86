import { z } from 'zod';

export const PROFICIENCY_LEVELS = ['Beginner', 'Intermediate', 'Advanced'] as const;
export const ProficiencyLevelSchema = z.enum(PROFICIENCY_LEVELS);
export type ProficiencyLevel = z.infer<typeof ProficiencyLevelSchema>;

export const SCENARIOS = ['Restaurant', 'Hotel', 'Shopping', 'Directions', 'Social', 'Work'] as const;
export const ScenarioSchema = z.enum(SCENARIOS);
export type Scenario = z.infer<typeof ScenarioSchema>;

/** Canonical mistake categories, in display order. */
export const ERROR_TYPES = ['grammar', 'vocabulary', 'pronunciation', 'syntax', 'other'] as const;
export const ErrorTypeSchema = z.enum(ERROR_TYPES);
export type ErrorType = z.infer<typeof ErrorTypeSchema>;

export const MAX_LANGUAGE_LENGTH = 50;
export const MAX_SENTENCE_LENGTH = 1000;
export const MAX_CHAT_MESSAGE_LENGTH = 2000;

const isoTimestamp = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .datetime({ message: `${field} must be an ISO-8601 timestamp` });

const languageName = (field: string) =>
  z
    .string({ required_error: 'Please specify both languages' })
    .trim()
    .min(1, 'Please specify both languages')
    .max(MAX_LANGUAGE_LENGTH, `${field} must be at most ${MAX_LANGUAGE_LENGTH} characters`);

const sentence = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} cannot be blank`)
    .max(MAX_SENTENCE_LENGTH, `${field} must be at most ${MAX_SENTENCE_LENGTH} characters`);

const count = z.number().int().nonnegative();

export const LessonConfigSchema = z.object({
  nativeLanguage: languageName('nativeLanguage'),
  learningLanguage: languageName('learningLanguage'),
  proficiencyLevel: ProficiencyLevelSchema.default('Beginner'),
  scenario: ScenarioSchema.default('Restaurant'),
});

export type LessonConfig = z.infer<typeof LessonConfigSchema>;
export type LessonConfigInput = z.input<typeof LessonConfigSchema>;

export const ChatRoleSchema = z.enum(['user', 'assistant']);
export type ChatRole = z.infer<typeof ChatRoleSchema>;

export const ChatMessageSchema = z.object({
  id: z.string().min(1, 'id is required'),
  role: ChatRoleSchema,
  content: z.string(),
  createdAt: isoTimestamp('createdAt'),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const ChatInputSchema = z.object({
  content: z
    .string({ required_error: 'content is required' })
    .trim()
    .min(1, 'content cannot be blank')
    .max(MAX_CHAT_MESSAGE_LENGTH, `content must be at most ${MAX_CHAT_MESSAGE_LENGTH} characters`),
});

export type ChatInput = z.infer<typeof ChatInputSchema>;

export const MistakeRecordSchema = z.object({
  id: z.number().int().positive(),
  timestamp: isoTimestamp('timestamp'),
  sessionId: z.string().min(1).nullable(),
  nativeLanguage: z.string(),
  targetLanguage: z.string(),
  errorSentence: z.string(),
  correctedSentence: z.string(),
  errorType: ErrorTypeSchema,
});

export type MistakeRecord = z.infer<typeof MistakeRecordSchema>;
export type MistakeDraft = Omit<MistakeRecord, 'id'>;

/**
 * Arguments of the `log_mistake` tool, in the snake_case shape the model emits.
 * Languages may be omitted; the lesson configuration fills them in.
 */
export const LogMistakeArgsSchema = z.object({
  native_lang: z.string().trim().max(MAX_LANGUAGE_LENGTH).optional(),
  target_lang: z.string().trim().max(MAX_LANGUAGE_LENGTH).optional(),
  error_sentence: sentence('error_sentence'),
  corrected_sentence: sentence('corrected_sentence'),
  error_type: z.string().trim().max(100).default('other'),
});

export type LogMistakeArgs = z.infer<typeof LogMistakeArgsSchema>;

export const LessonSessionSchema = z.object({
  sessionId: z.string().uuid({ message: 'sessionId must be a UUID string' }),
  config: LessonConfigSchema,
  messages: z.array(ChatMessageSchema),
  startedAt: isoTimestamp('startedAt'),
});

export type LessonSession = z.infer<typeof LessonSessionSchema>;

export const ChatTurnResultSchema = z.object({
  sessionId: z.string().uuid(),
  reply: ChatMessageSchema,
  mistakes: z.array(MistakeRecordSchema),
});

export type ChatTurnResult = z.infer<typeof ChatTurnResultSchema>;

export const ErrorTypeBreakdownSchema = z.object({
  errorType: ErrorTypeSchema,
  count,
  share: z.number().min(0).max(1),
});

export type ErrorTypeBreakdown = z.infer<typeof ErrorTypeBreakdownSchema>;

export const LanguageBreakdownSchema = z.object({
  targetLanguage: z.string(),
  count,
});

export type LanguageBreakdown = z.infer<typeof LanguageBreakdownSchema>;

export const DailyTrendPointSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be formatted as YYYY-MM-DD'),
  total: count,
  grammar: count,
  vocabulary: count,
  pronunciation: count,
  syntax: count,
  other: count,
});

export type DailyTrendPoint = z.infer<typeof DailyTrendPointSchema>;

export const RecurringMistakeSchema = z.object({
  errorSentence: z.string(),
  correctedSentence: z.string(),
  errorType: ErrorTypeSchema,
  occurrences: z.number().int().min(2),
  lastSeenAt: isoTimestamp('lastSeenAt'),
});

export type RecurringMistake = z.infer<typeof RecurringMistakeSchema>;

export const FeedbackWindowSchema = z.object({
  from: isoTimestamp('from'),
  to: isoTimestamp('to'),
  days: z.number().int().positive(),
});

export const FeedbackSummarySchema = z.object({
  window: FeedbackWindowSchema,
  targetLanguage: z.string().nullable(),
  totalMistakes: count,
  byErrorType: z.array(ErrorTypeBreakdownSchema),
  byLanguage: z.array(LanguageBreakdownSchema),
  dailyTrend: z.array(DailyTrendPointSchema),
  recurringMistakes: z.array(RecurringMistakeSchema),
  recentMistakes: z.array(MistakeRecordSchema),
  topErrorType: ErrorTypeSchema.nullable(),
  highlights: z.array(z.string()),
});

export type FeedbackSummary = z.infer<typeof FeedbackSummarySchema>;

export const HealthStatusSchema = z.object({
  status: z.literal('ok'),
  llmConfigured: z.boolean(),
  model: z.string(),
  mistakeCount: count,
});

export type HealthStatus = z.infer<typeof HealthStatusSchema>;
