import React from "react";

import { FEEDBACK_PERIODS } from "../../hooks/useFeedback";
import type { FeedbackPeriod } from "../../hooks/useFeedback";

interface FeedbackFiltersProps {
  days: FeedbackPeriod;
  targetLanguage: string | null;
  languages: string[];
  onDaysChange: (days: FeedbackPeriod) => void;
  onLanguageChange: (language: string | null) => void;
  disabled?: boolean;
}

const ALL_LANGUAGES = "__all__";

function toPeriod(value: string): FeedbackPeriod | null {
  const parsed = Number(value);
  return FEEDBACK_PERIODS.find((period) => period === parsed) ?? null;
}

export const FeedbackFilters: React.FC<FeedbackFiltersProps> = ({
  days,
  targetLanguage,
  languages,
  onDaysChange,
  onLanguageChange,
  disabled = false
}) => {
  return (
    <div className="flex flex-wrap gap-4" role="group" aria-label="Feedback filters">
      <label className="flex flex-col text-sm text-gray-700">
        Period
        <select
          value={String(days)}
          disabled={disabled}
          onChange={(event) => {
            const period = toPeriod(event.target.value);
            if (period !== null) {
              onDaysChange(period);
            }
          }}
          className="mt-1 rounded-md border border-gray-300 px-2 py-1"
        >
          {FEEDBACK_PERIODS.map((period) => (
            <option key={period} value={String(period)}>
              Last {period} days
            </option>
          ))}
        </select>
      </label>

      <label className="flex flex-col text-sm text-gray-700">
        Language
        <select
          value={targetLanguage ?? ALL_LANGUAGES}
          disabled={disabled}
          onChange={(event) => {
            const value = event.target.value;
            onLanguageChange(value === ALL_LANGUAGES ? null : value);
          }}
          className="mt-1 rounded-md border border-gray-300 px-2 py-1"
        >
          <option value={ALL_LANGUAGES}>All languages</option>
          {languages.map((language) => (
            <option key={language} value={language}>
              {language}
            </option>
          ))}
        </select>
      </label>
    </div>
  );
};
