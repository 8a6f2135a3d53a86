import type { MistakeRecord } from "@language-tutor/shared/tutor";
import React from "react";

import { formatTimestamp } from "../../utils/chartData";

interface ErrorLogProps {
  mistakes: MistakeRecord[];
  loaded: boolean;
  loading: boolean;
  error: string | null;
  onView: () => void;
}

export const ErrorLog: React.FC<ErrorLogProps> = ({ mistakes, loaded, loading, error, onView }) => {
  return (
    <section aria-labelledby="error-log-heading" className="space-y-3">
      <h2 id="error-log-heading" className="text-lg font-semibold text-gray-900">
        Error Log
      </h2>
      <button
        type="button"
        onClick={onView}
        disabled={loading}
        className="w-full rounded-md border border-brand-600 px-3 py-2 font-medium text-brand-700 hover:bg-brand-50 disabled:opacity-60"
      >
        View Mistakes
      </button>

      {error && (
        <p role="alert" className="text-sm text-red-600">
          {error}
        </p>
      )}

      {loaded && !error && mistakes.length === 0 && <p className="text-sm text-gray-600">No mistakes logged yet</p>}

      {loaded && mistakes.length > 0 && (
        <div>
          <h3 className="text-sm font-semibold text-gray-800">Recent Mistakes</h3>
          <ul className="mt-2 space-y-3" aria-label="Recent mistakes">
            {mistakes.map((mistake) => (
              <li key={mistake.id} className="rounded-md bg-white p-3 text-sm shadow-sm">
                <p>
                  <strong>Error</strong>: <code>{mistake.errorSentence}</code>
                </p>
                <p>
                  <strong>Correction</strong>: <code>{mistake.correctedSentence}</code>
                </p>
                <p>
                  <strong>Type</strong>: {mistake.errorType}
                </p>
                <p className="italic text-gray-500">
                  <time dateTime={mistake.timestamp}>{formatTimestamp(mistake.timestamp)}</time>
                </p>
              </li>
            ))}
          </ul>
        </div>
      )}
    </section>
  );
};
