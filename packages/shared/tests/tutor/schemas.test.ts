import { describe, expect, it } from 'vitest';
import {
  ChatInputSchema,
  DailyTrendPointSchema,
  LessonConfigSchema,
  LogMistakeArgsSchema,
  MistakeRecordSchema,
  ProficiencyLevelSchema,
  RecurringMistakeSchema,
  ScenarioSchema,
} from '../../src/tutor/schemas.js';

const validMistake = {
  id: 1,
  timestamp: '2026-03-04T10:15:00.000Z',
  sessionId: null,
  nativeLanguage: 'English',
  targetLanguage: 'Spanish',
  errorSentence: 'Yo tener hambre',
  correctedSentence: 'Yo tengo hambre',
  errorType: 'grammar',
} as const;

describe('LessonConfigSchema', () => {
  it('trims languages and applies defaults', () => {
    const parsed = LessonConfigSchema.parse({
      nativeLanguage: '  English ',
      learningLanguage: 'Spanish',
    });

    expect(parsed).toEqual({
      nativeLanguage: 'English',
      learningLanguage: 'Spanish',
      proficiencyLevel: 'Beginner',
      scenario: 'Restaurant',
    });
  });

  it('requires both languages', () => {
    const result = LessonConfigSchema.safeParse({
      nativeLanguage: 'English',
      learningLanguage: '   ',
      proficiencyLevel: 'Advanced',
      scenario: 'Hotel',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Please specify both languages');
      expect(result.error.issues[0]?.path).toEqual(['learningLanguage']);
    }
  });

  it('rejects overly long language names', () => {
    expect(() =>
      LessonConfigSchema.parse({ nativeLanguage: 'x'.repeat(51), learningLanguage: 'French' })
    ).toThrow(/at most 50 characters/);
  });
});

describe('ProficiencyLevelSchema and ScenarioSchema', () => {
  it('accept the lesson options', () => {
    expect(ProficiencyLevelSchema.parse('Intermediate')).toBe('Intermediate');
    expect(ScenarioSchema.parse('Directions')).toBe('Directions');
  });

  it('reject unknown options', () => {
    expect(() => ProficiencyLevelSchema.parse('Expert')).toThrow(/Invalid enum value/);
    expect(() => ScenarioSchema.parse('Airport')).toThrow(/Invalid enum value/);
  });
});

describe('ChatInputSchema', () => {
  it('trims content', () => {
    expect(ChatInputSchema.parse({ content: '  Hola  ' })).toEqual({ content: 'Hola' });
  });

  it('rejects blank and oversized content', () => {
    expect(ChatInputSchema.safeParse({ content: '   ' }).success).toBe(false);
    expect(ChatInputSchema.safeParse({ content: 'a'.repeat(2001) }).success).toBe(false);
  });
});

describe('LogMistakeArgsSchema', () => {
  it('accepts the tool payload and defaults the error type', () => {
    const parsed = LogMistakeArgsSchema.parse({
      native_lang: 'English',
      target_lang: 'Spanish',
      error_sentence: ' Yo tener hambre ',
      corrected_sentence: 'Yo tengo hambre',
    });

    expect(parsed).toEqual({
      native_lang: 'English',
      target_lang: 'Spanish',
      error_sentence: 'Yo tener hambre',
      corrected_sentence: 'Yo tengo hambre',
      error_type: 'other',
    });
  });

  it('allows languages to be omitted', () => {
    const parsed = LogMistakeArgsSchema.parse({
      error_sentence: 'Je suis allé au magasin hier et achète du pain',
      corrected_sentence: "Je suis allé au magasin hier et j'ai acheté du pain",
      error_type: 'grammar',
    });

    expect(parsed.native_lang).toBeUndefined();
    expect(parsed.target_lang).toBeUndefined();
  });

  it('rejects a blank corrected sentence', () => {
    const result = LogMistakeArgsSchema.safeParse({
      error_sentence: 'Ich habe gegangen',
      corrected_sentence: ' ',
      error_type: 'grammar',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('corrected_sentence cannot be blank');
    }
  });
});

describe('MistakeRecordSchema', () => {
  it('validates a stored mistake', () => {
    expect(MistakeRecordSchema.parse(validMistake)).toEqual(validMistake);
  });

  it('rejects non-canonical error types', () => {
    expect(() => MistakeRecordSchema.parse({ ...validMistake, errorType: 'Grammar' })).toThrow(
      /Invalid enum value/
    );
  });

  it('rejects timestamps that are not ISO-8601', () => {
    expect(() =>
      MistakeRecordSchema.parse({ ...validMistake, timestamp: '2026-03-04 10:15:00' })
    ).toThrow(/timestamp must be an ISO-8601 timestamp/);
  });
});

describe('feedback schemas', () => {
  it('requires daily trend dates as YYYY-MM-DD', () => {
    const point = {
      date: '2026-03-04',
      total: 1,
      grammar: 1,
      vocabulary: 0,
      pronunciation: 0,
      syntax: 0,
      other: 0,
    };

    expect(DailyTrendPointSchema.parse(point)).toEqual(point);
    expect(DailyTrendPointSchema.safeParse({ ...point, date: '04/03/2026' }).success).toBe(false);
  });

  it('only treats mistakes seen at least twice as recurring', () => {
    const recurring = {
      errorSentence: 'Yo tener hambre',
      correctedSentence: 'Yo tengo hambre',
      errorType: 'grammar',
      occurrences: 1,
      lastSeenAt: '2026-03-04T10:15:00.000Z',
    };

    expect(RecurringMistakeSchema.safeParse(recurring).success).toBe(false);
    expect(RecurringMistakeSchema.safeParse({ ...recurring, occurrences: 2 }).success).toBe(true);
  });
});
