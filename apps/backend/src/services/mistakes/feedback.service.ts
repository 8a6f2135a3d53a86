import {
	ERROR_TYPES,
	FeedbackSummarySchema,
	errorTypeOrder,
	type DailyTrendPoint,
	type ErrorType,
	type ErrorTypeBreakdown,
	type FeedbackSummary,
	type LanguageBreakdown,
	type MistakeRecord,
	type RecurringMistake
} from "@language-tutor/shared/tutor";

import { clampRecentLimit, type MistakeStore } from "./mistake-store.js";

export const DEFAULT_FEEDBACK_DAYS = 30;
export const MAX_FEEDBACK_DAYS = 365;
export const MAX_RECURRING_MISTAKES = 5;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FeedbackOptions {
	days?: number;
	targetLanguage?: string;
	recentLimit?: number;
}

export interface FeedbackServiceOptions {
	store: MistakeStore;
	now?: () => Date;
}

/**
 * Aggregates logged mistakes over a window of whole UTC days into the
 * summary the feedback view charts.
 */
export class FeedbackService {
	private readonly store: MistakeStore;
	private readonly now: () => Date;

	constructor(options: FeedbackServiceOptions) {
		this.store = options.store;
		this.now = options.now ?? (() => new Date());
	}

	async summarize(options: FeedbackOptions = {}): Promise<FeedbackSummary> {
		const days = clampDays(options.days);
		const targetLanguage = options.targetLanguage?.trim() || null;
		const to = this.now();
		const from = new Date(startOfUtcDay(to).getTime() - (days - 1) * DAY_MS);

		const mistakes = await this.store.listBetween(
			from,
			to,
			targetLanguage ? { targetLanguage } : {}
		);

		const byErrorType = summarizeByErrorType(mistakes);
		const dailyTrend = buildDailyTrend(mistakes, from, days);
		const topErrorType = byErrorType.find((entry) => entry.count > 0)?.errorType ?? null;

		const summary: FeedbackSummary = {
			window: { from: from.toISOString(), to: to.toISOString(), days },
			targetLanguage,
			totalMistakes: mistakes.length,
			byErrorType,
			byLanguage: summarizeByLanguage(mistakes),
			dailyTrend,
			recurringMistakes: findRecurringMistakes(mistakes),
			recentMistakes: [...mistakes].reverse().slice(0, clampRecentLimit(options.recentLimit)),
			topErrorType,
			highlights: buildHighlights(mistakes.length, days, byErrorType, dailyTrend)
		};

		return FeedbackSummarySchema.parse(summary);
	}
}

export function clampDays(days: number | undefined): number {
	if (days === undefined || !Number.isFinite(days)) {
		return DEFAULT_FEEDBACK_DAYS;
	}
	return Math.min(MAX_FEEDBACK_DAYS, Math.max(1, Math.trunc(days)));
}

function startOfUtcDay(date: Date): Date {
	return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function summarizeByErrorType(mistakes: MistakeRecord[]): ErrorTypeBreakdown[] {
	const counts = new Map<ErrorType, number>(ERROR_TYPES.map((type) => [type, 0]));
	for (const mistake of mistakes) {
		counts.set(mistake.errorType, (counts.get(mistake.errorType) ?? 0) + 1);
	}

	const total = mistakes.length;
	return ERROR_TYPES.map((errorType) => {
		const count = counts.get(errorType) ?? 0;
		return {
			errorType,
			count,
			share: total === 0 ? 0 : Math.round((count / total) * 10_000) / 10_000
		};
	}).sort((a, b) => b.count - a.count || errorTypeOrder(a.errorType) - errorTypeOrder(b.errorType));
}

function summarizeByLanguage(mistakes: MistakeRecord[]): LanguageBreakdown[] {
	// Keyed case-insensitively; the most recent spelling is displayed.
	const groups = new Map<string, LanguageBreakdown>();
	for (const mistake of mistakes) {
		const label = mistake.targetLanguage.trim();
		const key = label.toLowerCase();
		const existing = groups.get(key);
		groups.set(key, { targetLanguage: label, count: (existing?.count ?? 0) + 1 });
	}

	return [...groups.values()].sort(
		(a, b) => b.count - a.count || a.targetLanguage.localeCompare(b.targetLanguage)
	);
}

function buildDailyTrend(mistakes: MistakeRecord[], from: Date, days: number): DailyTrendPoint[] {
	const points = new Map<string, DailyTrendPoint>();
	for (let offset = 0; offset < days; offset += 1) {
		const date = new Date(from.getTime() + offset * DAY_MS).toISOString().slice(0, 10);
		points.set(date, {
			date,
			total: 0,
			grammar: 0,
			vocabulary: 0,
			pronunciation: 0,
			syntax: 0,
			other: 0
		});
	}

	for (const mistake of mistakes) {
		const point = points.get(new Date(mistake.timestamp).toISOString().slice(0, 10));
		if (!point) {
			continue;
		}
		point.total += 1;
		point[mistake.errorType] += 1;
	}

	return [...points.values()];
}

function normalizeSentence(sentence: string): string {
	return sentence.trim().toLowerCase().replace(/\s+/gu, " ");
}

function findRecurringMistakes(mistakes: MistakeRecord[]): RecurringMistake[] {
	const groups = new Map<string, RecurringMistake>();
	// Oldest first, so each later occurrence overwrites the displayed fields.
	for (const mistake of mistakes) {
		const key = normalizeSentence(mistake.errorSentence);
		if (key.length === 0) {
			continue;
		}
		const existing = groups.get(key);
		groups.set(key, {
			errorSentence: mistake.errorSentence,
			correctedSentence: mistake.correctedSentence,
			errorType: mistake.errorType,
			occurrences: (existing?.occurrences ?? 0) + 1,
			lastSeenAt: mistake.timestamp
		});
	}

	return [...groups.values()]
		.filter((entry) => entry.occurrences >= 2)
		.sort((a, b) => b.occurrences - a.occurrences || b.lastSeenAt.localeCompare(a.lastSeenAt))
		.slice(0, MAX_RECURRING_MISTAKES);
}

function pluralize(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function buildHighlights(
	total: number,
	days: number,
	byErrorType: ErrorTypeBreakdown[],
	dailyTrend: DailyTrendPoint[]
): string[] {
	const period = `in the last ${pluralize(days, "day")}`;
	if (total === 0) {
		return [`No mistakes logged ${period}.`];
	}

	const highlights = [`${pluralize(total, "mistake")} logged ${period}.`];

	const top = byErrorType[0];
	if (top && top.count > 0) {
		highlights.push(`Most common: ${top.errorType} (${Math.round(top.share * 100)}% of mistakes).`);
	}

	if (days >= 2) {
		const split = Math.floor(days / 2);
		const firstAverage = sumTotals(dailyTrend.slice(0, split)) / split;
		const secondAverage = sumTotals(dailyTrend.slice(split)) / (days - split);
		if (secondAverage > firstAverage) {
			highlights.push("Mistakes are trending up in the second half of this period.");
		} else if (secondAverage < firstAverage) {
			highlights.push("Mistakes are trending down in the second half of this period.");
		} else {
			highlights.push("Mistakes are holding steady across this period.");
		}
	}

	return highlights;
}

function sumTotals(points: DailyTrendPoint[]): number {
	return points.reduce((sum, point) => sum + point.total, 0);
}
