import type { FeedbackSummary } from "@language-tutor/shared/tutor";
import { useCallback, useEffect, useRef, useState } from "react";

import { defaultTutorClient } from "../api/tutorClient";
import type { TutorApi } from "../api/tutorClient";

export const FEEDBACK_PERIODS = [7, 30, 90] as const;
export type FeedbackPeriod = (typeof FEEDBACK_PERIODS)[number];

export interface FeedbackFilters {
  days: FeedbackPeriod;
  /** `null` covers every language. */
  targetLanguage: string | null;
}

export interface UseFeedbackResult {
  summary: FeedbackSummary | null;
  loading: boolean;
  error: string | null;
  refresh: () => Promise<void>;
}

/**
 * Loads the feedback summary on mount and whenever the filters change.
 * Responses to superseded requests are dropped.
 */
export function useFeedback(filters: FeedbackFilters, client: TutorApi = defaultTutorClient): UseFeedbackResult {
  const [summary, setSummary] = useState<FeedbackSummary | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const requestIdRef = useRef(0);
  const { days, targetLanguage } = filters;

  const refresh = useCallback(async () => {
    const requestId = ++requestIdRef.current;
    setLoading(true);
    setError(null);

    try {
      const next = await client.getFeedback({ days, targetLanguage: targetLanguage ?? undefined });
      if (requestId === requestIdRef.current) {
        setSummary(next);
      }
    } catch (loadError) {
      if (requestId === requestIdRef.current) {
        setError(loadError instanceof Error ? loadError.message : "Unexpected error");
      }
    } finally {
      if (requestId === requestIdRef.current) {
        setLoading(false);
      }
    }
  }, [client, days, targetLanguage]);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  useEffect(() => {
    return () => {
      // Invalidate in-flight requests on unmount.
      requestIdRef.current += 1;
    };
  }, []);

  return { summary, loading, error, refresh };
}
