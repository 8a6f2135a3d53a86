import { renderHook, waitFor } from "@testing-library/react";
import { beforeEach, describe, expect, it } from "vitest";

import { TutorApiError } from "../../src/api/tutorClient";
import { useTutorHealth } from "../../src/hooks/useTutorHealth";
import { buildHealth, createFakeClient } from "../helpers/fixtures";
import type { FakeTutorApi } from "../helpers/fixtures";

describe("useTutorHealth", () => {
  let client: FakeTutorApi;

  beforeEach(() => {
    client = createFakeClient();
  });

  it("loads the backend health once", async () => {
    client.getHealth.mockResolvedValue(buildHealth({ llmConfigured: false, mistakeCount: 4 }));
    const { result } = renderHook(() => useTutorHealth(client));

    await waitFor(() => {
      expect(result.current.health).toEqual(buildHealth({ llmConfigured: false, mistakeCount: 4 }));
    });
    expect(result.current.error).toBeNull();
    expect(client.getHealth).toHaveBeenCalledTimes(1);
  });

  it("reports an unreachable backend", async () => {
    client.getHealth.mockRejectedValue(
      new TutorApiError("NETWORK_ERROR", "Could not reach the tutor service: fetch failed")
    );
    const { result } = renderHook(() => useTutorHealth(client));

    await waitFor(() => {
      expect(result.current.error).toBe("Could not reach the tutor service: fetch failed");
    });
    expect(result.current.health).toBeNull();
  });
});
