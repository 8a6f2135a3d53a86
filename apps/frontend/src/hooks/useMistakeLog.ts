import type { MistakeRecord } from "@language-tutor/shared/tutor";
import { useCallback, useRef, useState } from "react";

import { defaultTutorClient } from "../api/tutorClient";
import type { TutorApi } from "../api/tutorClient";

export const ERROR_LOG_LIMIT = 10;

export interface UseMistakeLogResult {
  mistakes: MistakeRecord[];
  /** False until the first load completes. */
  loaded: boolean;
  loading: boolean;
  error: string | null;
  load: (targetLanguage?: string) => Promise<void>;
}

export function useMistakeLog(client: TutorApi = defaultTutorClient, limit = ERROR_LOG_LIMIT): UseMistakeLogResult {
  const [mistakes, setMistakes] = useState<MistakeRecord[]>([]);
  const [loaded, setLoaded] = useState(false);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const requestIdRef = useRef(0);

  const load = useCallback(
    async (targetLanguage?: string) => {
      const requestId = ++requestIdRef.current;
      setLoading(true);
      setError(null);

      try {
        const records = await client.listMistakes({ limit, targetLanguage });
        if (requestId === requestIdRef.current) {
          setMistakes(records);
          setLoaded(true);
        }
      } catch (loadError) {
        if (requestId === requestIdRef.current) {
          const message = loadError instanceof Error ? loadError.message : "Unexpected error";
          setError(`Error accessing mistake log: ${message}`);
        }
      } finally {
        if (requestId === requestIdRef.current) {
          setLoading(false);
        }
      }
    },
    [client, limit]
  );

  return { mistakes, loaded, loading, error, load };
}
