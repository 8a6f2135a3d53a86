import type { MistakeRecord, RecurringMistake } from "@language-tutor/shared/tutor";
import React from "react";

import { formatTimestamp } from "../../utils/chartData";

export const RecurringMistakes: React.FC<{ items: RecurringMistake[] }> = ({ items }) => {
  return (
    <section aria-labelledby="recurring-heading" className="rounded-xl bg-white p-4 shadow">
      <h2 id="recurring-heading" className="mb-2 font-semibold text-gray-900">
        Recurring mistakes
      </h2>
      {items.length === 0 ? (
        <p className="text-sm text-gray-600">No mistake has been repeated in this period.</p>
      ) : (
        <ul className="space-y-2 text-sm">
          {items.map((item) => (
            <li key={`${item.errorSentence}-${item.lastSeenAt}`}>
              <code>{item.errorSentence}</code> → <code>{item.correctedSentence}</code>{" "}
              <span className="text-gray-600">
                ({item.errorType}, {item.occurrences} times)
              </span>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
};

export const RecentMistakesList: React.FC<{ items: MistakeRecord[] }> = ({ items }) => {
  return (
    <section aria-labelledby="recent-heading" className="rounded-xl bg-white p-4 shadow">
      <h2 id="recent-heading" className="mb-2 font-semibold text-gray-900">
        Recent mistakes
      </h2>
      {items.length === 0 ? (
        <p className="text-sm text-gray-600">No mistakes logged yet</p>
      ) : (
        <table className="w-full text-left text-sm">
          <thead>
            <tr>
              <th scope="col">Error</th>
              <th scope="col">Correction</th>
              <th scope="col">Type</th>
              <th scope="col">Language</th>
              <th scope="col">When</th>
            </tr>
          </thead>
          <tbody>
            {items.map((item) => (
              <tr key={item.id}>
                <td>{item.errorSentence}</td>
                <td>{item.correctedSentence}</td>
                <td>{item.errorType}</td>
                <td>{item.targetLanguage}</td>
                <td>
                  <time dateTime={item.timestamp}>{formatTimestamp(item.timestamp)}</time>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  );
};
