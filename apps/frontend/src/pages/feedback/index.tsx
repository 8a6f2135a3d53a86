import React, { useEffect, useMemo, useState } from "react";

import { defaultTutorClient } from "../../api/tutorClient";
import type { TutorApi } from "../../api/tutorClient";
import { DailyTrendChart } from "../../components/Feedback/DailyTrendChart";
import { ErrorTypeChart } from "../../components/Feedback/ErrorTypeChart";
import { FeedbackFilters } from "../../components/Feedback/FeedbackFilters";
import { RecentMistakesList, RecurringMistakes } from "../../components/Feedback/MistakeLists";
import { Header } from "../../components/Header/Header";
import { useFeedback } from "../../hooks/useFeedback";
import type { FeedbackPeriod } from "../../hooks/useFeedback";
import { activeErrorTypes, mergeLanguageOptions, toErrorTypeSeries, toTrendSeries } from "../../utils/chartData";

interface FeedbackPageProps {
  client?: TutorApi;
}

export const FeedbackPage: React.FC<FeedbackPageProps> = ({ client = defaultTutorClient }) => {
  const [days, setDays] = useState<FeedbackPeriod>(30);
  const [targetLanguage, setTargetLanguage] = useState<string | null>(null);
  const [languages, setLanguages] = useState<string[]>([]);
  const { summary, loading, error, refresh } = useFeedback({ days, targetLanguage }, client);

  useEffect(() => {
    if (summary) {
      setLanguages((known) => mergeLanguageOptions(known, summary.byLanguage));
    }
  }, [summary]);

  const errorTypeSeries = useMemo(() => (summary ? toErrorTypeSeries(summary) : []), [summary]);
  const trendSeries = useMemo(() => (summary ? toTrendSeries(summary) : []), [summary]);
  const trendTypes = useMemo(() => (summary ? activeErrorTypes(summary) : []), [summary]);

  return (
    <>
      <Header current="feedback" />
      <main className="mx-auto max-w-6xl space-y-6 p-6">
        <div className="flex flex-wrap items-end justify-between gap-4">
          <h1 className="text-2xl font-bold text-gray-900">Feedback</h1>
          <FeedbackFilters
            days={days}
            targetLanguage={targetLanguage}
            languages={languages}
            onDaysChange={setDays}
            onLanguageChange={setTargetLanguage}
            disabled={loading}
          />
          <div className="flex gap-3">
            <button type="button" onClick={() => void refresh()} disabled={loading} className="underline disabled:opacity-60">
              Refresh
            </button>
            <a href={client.exportUrl(targetLanguage ?? undefined)} download className="underline">
              Export CSV
            </a>
          </div>
        </div>

        {error && (
          <p role="alert" className="rounded-md bg-red-50 px-4 py-2 text-sm text-red-700">
            {error}
          </p>
        )}

        {loading && !summary && <p role="status">Loading feedback...</p>}

        {summary && (
          <>
            <section aria-label="Summary" className="rounded-xl bg-white p-4 shadow">
              <p className="text-3xl font-bold text-gray-900" data-testid="total-mistakes">
                {summary.totalMistakes}
              </p>
              <p className="text-sm text-gray-600">mistakes in the last {summary.window.days} days</p>
              <ul className="mt-3 list-disc space-y-1 pl-5 text-gray-800">
                {summary.highlights.map((highlight) => (
                  <li key={highlight}>{highlight}</li>
                ))}
              </ul>
            </section>

            {summary.totalMistakes > 0 && (
              <div className="grid gap-6 lg:grid-cols-2">
                <ErrorTypeChart data={errorTypeSeries} />
                <DailyTrendChart data={trendSeries} errorTypes={trendTypes} />
              </div>
            )}

            <div className="grid gap-6 lg:grid-cols-2">
              <RecurringMistakes items={summary.recurringMistakes} />
              <RecentMistakesList items={summary.recentMistakes} />
            </div>
          </>
        )}
      </main>
    </>
  );
};
