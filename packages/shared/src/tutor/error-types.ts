import { ERROR_TYPES, type ErrorType } from './schemas.js';

const ERROR_TYPE_ALIASES: ReadonlyMap<string, ErrorType> = new Map<string, ErrorType>([
  ['grammatical', 'grammar'],
  ['conjugation', 'grammar'],
  ['verb conjugation', 'grammar'],
  ['tense', 'grammar'],
  ['agreement', 'grammar'],
  ['gender', 'grammar'],
  ['article', 'grammar'],
  ['vocab', 'vocabulary'],
  ['word choice', 'vocabulary'],
  ['spelling', 'vocabulary'],
  ['lexical', 'vocabulary'],
  ['accent', 'pronunciation'],
  ['phonetic', 'pronunciation'],
  ['word order', 'syntax'],
  ['syntactic', 'syntax'],
  ['structure', 'syntax'],
  ['sentence structure', 'syntax'],
]);

export function isErrorType(value: string): value is ErrorType {
  return (ERROR_TYPES as readonly string[]).includes(value);
}

function lookup(key: string): ErrorType | null {
  if (isErrorType(key)) {
    return key;
  }
  return ERROR_TYPE_ALIASES.get(key) ?? null;
}

/**
 * Maps the free-text category a model attaches to a mistake onto one of the
 * canonical {@link ERROR_TYPES}. Combined labels such as `grammar/syntax` take
 * their first segment; unknown labels become `other`.
 */
export function normalizeErrorType(raw: string | null | undefined): ErrorType {
  if (!raw) {
    return 'other';
  }

  const [firstSegment = ''] = raw.split(/[/,|]/u);
  const key = firstSegment.trim().toLowerCase().replace(/[\s_-]+/gu, ' ');
  if (key.length === 0) {
    return 'other';
  }

  const direct = lookup(key);
  if (direct) {
    return direct;
  }

  const withoutErrorSuffix = key.replace(/\s+(error|errors|mistake|mistakes)$/u, '');
  const singular = withoutErrorSuffix.endsWith('s') ? withoutErrorSuffix.slice(0, -1) : withoutErrorSuffix;
  return lookup(withoutErrorSuffix) ?? lookup(singular) ?? 'other';
}

export function errorTypeOrder(errorType: ErrorType): number {
  return ERROR_TYPES.indexOf(errorType);
}
