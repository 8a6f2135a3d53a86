import type { HealthStatus } from "@language-tutor/shared/tutor";
import { useEffect, useState } from "react";

import { defaultTutorClient } from "../api/tutorClient";
import type { TutorApi } from "../api/tutorClient";

export interface UseTutorHealthResult {
  health: HealthStatus | null;
  error: string | null;
}

/** Fetches the backend health once on mount. */
export function useTutorHealth(client: TutorApi = defaultTutorClient): UseTutorHealthResult {
  const [health, setHealth] = useState<HealthStatus | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let active = true;
    client.getHealth().then(
      (status) => {
        if (active) {
          setHealth(status);
        }
      },
      (healthError: unknown) => {
        if (active) {
          setError(healthError instanceof Error ? healthError.message : "Unexpected error");
        }
      }
    );
    return () => {
      active = false;
    };
  }, [client]);

  return { health, error };
}
