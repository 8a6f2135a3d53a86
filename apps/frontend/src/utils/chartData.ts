import { ERROR_TYPES } from "@language-tutor/shared/tutor";
import type { ErrorType, FeedbackSummary, LanguageBreakdown } from "@language-tutor/shared/tutor";

export interface ErrorTypeDatum {
  errorType: ErrorType;
  label: string;
  count: number;
  percent: number;
}

export interface TrendDatum {
  date: string;
  label: string;
  total: number;
  grammar: number;
  vocabulary: number;
  pronunciation: number;
  syntax: number;
  other: number;
}

export const ERROR_TYPE_COLORS: Record<ErrorType, string> = {
  grammar: "#3f5dff",
  vocabulary: "#10b981",
  pronunciation: "#f59e0b",
  syntax: "#ef4444",
  other: "#64748b"
};

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

export function formatErrorType(errorType: ErrorType): string {
  return errorType.charAt(0).toUpperCase() + errorType.slice(1);
}

/** `2024-05-03` → `"May 3"`. Dates that do not parse are returned as given. */
export function formatDayLabel(date: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) {
    return date;
  }
  const month = MONTHS[Number(match[2]) - 1];
  if (!month) {
    return date;
  }
  return `${month} ${Number(match[3])}`;
}

/** ISO timestamps are shown in UTC as `YYYY-MM-DD HH:mm`. */
export function formatTimestamp(timestamp: string): string {
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) {
    return timestamp;
  }
  return `${parsed.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

/**
 * Bar chart series in canonical error type order, keeping zero counts so the
 * axis stays stable between periods.
 */
export function toErrorTypeSeries(summary: FeedbackSummary): ErrorTypeDatum[] {
  const byType = new Map(summary.byErrorType.map((entry) => [entry.errorType, entry]));
  return ERROR_TYPES.map((errorType) => {
    const entry = byType.get(errorType);
    return {
      errorType,
      label: formatErrorType(errorType),
      count: entry?.count ?? 0,
      percent: Math.round((entry?.share ?? 0) * 1000) / 10
    };
  });
}

export function toTrendSeries(summary: FeedbackSummary): TrendDatum[] {
  return summary.dailyTrend.map((point) => ({
    ...point,
    label: formatDayLabel(point.date)
  }));
}

/** Error types that occur at least once in the trend, for the line legend. */
export function activeErrorTypes(summary: FeedbackSummary): ErrorType[] {
  return ERROR_TYPES.filter((errorType) => summary.dailyTrend.some((point) => point[errorType] > 0));
}

/**
 * Language filter options: languages seen in earlier summaries plus the ones
 * in this summary, without case-insensitive duplicates.
 */
export function mergeLanguageOptions(known: string[], byLanguage: LanguageBreakdown[]): string[] {
  const options = [...known];
  for (const entry of byLanguage) {
    const exists = options.some((option) => option.toLowerCase() === entry.targetLanguage.toLowerCase());
    if (!exists) {
      options.push(entry.targetLanguage);
    }
  }
  return options.sort((a, b) => a.localeCompare(b));
}
