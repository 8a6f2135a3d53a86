import { generateId } from "@language-tutor/shared";
import type { ChatMessage, LessonConfigInput, LessonSession, MistakeRecord } from "@language-tutor/shared/tutor";
import { useCallback, useEffect, useRef, useState } from "react";

import { TutorApiError, defaultTutorClient } from "../api/tutorClient";
import type { TutorApi } from "../api/tutorClient";

export interface UseLessonSessionResult {
  session: LessonSession | null;
  messages: ChatMessage[];
  /** `"starting"` while the opener is prepared, `"replying"` during a turn. */
  pending: "starting" | "replying" | null;
  error: string | null;
  lastMistakes: MistakeRecord[];
  startLesson: (config: LessonConfigInput) => Promise<boolean>;
  sendMessage: (content: string) => Promise<boolean>;
  endLesson: () => Promise<void>;
  clearError: () => void;
}

function getErrorMessage(value: unknown): string {
  if (value instanceof Error) {
    return value.message || "Unexpected error";
  }

  if (typeof value === "string") {
    return value || "Unexpected error";
  }

  return "Unexpected error";
}

function isSessionGone(error: unknown): boolean {
  return error instanceof TutorApiError && error.code === "SESSION_NOT_FOUND";
}

export function useLessonSession(client: TutorApi = defaultTutorClient): UseLessonSessionResult {
  const [session, setSession] = useState<LessonSession | null>(null);
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [pending, setPending] = useState<UseLessonSessionResult["pending"]>(null);
  const [error, setError] = useState<string | null>(null);
  const [lastMistakes, setLastMistakes] = useState<MistakeRecord[]>([]);
  const sessionRef = useRef<LessonSession | null>(null);
  const pendingRef = useRef(false);
  const mountedRef = useRef(true);

  useEffect(() => {
    mountedRef.current = true;
    return () => {
      mountedRef.current = false;
    };
  }, []);

  const applySession = useCallback((next: LessonSession | null) => {
    sessionRef.current = next;
    setSession(next);
    setMessages(next ? next.messages : []);
    setLastMistakes([]);
  }, []);

  const releaseSession = useCallback(
    async (sessionId: string) => {
      try {
        await client.endLesson(sessionId);
      } catch (endError) {
        if (!isSessionGone(endError)) {
          console.warn("Failed to end previous lesson", endError);
        }
      }
    },
    [client]
  );

  const startLesson = useCallback(
    async (config: LessonConfigInput): Promise<boolean> => {
      if (pendingRef.current) {
        return false;
      }

      pendingRef.current = true;
      setPending("starting");
      setError(null);

      const previous = sessionRef.current;
      try {
        if (previous) {
          await releaseSession(previous.sessionId);
        }
        const started = await client.startLesson(config);
        if (mountedRef.current) {
          applySession(started);
        }
        return true;
      } catch (startError) {
        if (mountedRef.current) {
          applySession(null);
          setError(getErrorMessage(startError));
        }
        return false;
      } finally {
        pendingRef.current = false;
        if (mountedRef.current) {
          setPending(null);
        }
      }
    },
    [applySession, client, releaseSession]
  );

  const sendMessage = useCallback(
    async (content: string): Promise<boolean> => {
      const text = content.trim();
      const current = sessionRef.current;
      if (!text || pendingRef.current) {
        return false;
      }

      if (!current) {
        setError("Configure your lesson in the sidebar to begin");
        return false;
      }

      const optimistic: ChatMessage = {
        id: generateId("local"),
        role: "user",
        content: text,
        createdAt: new Date().toISOString()
      };

      pendingRef.current = true;
      setPending("replying");
      setError(null);
      setMessages((previous) => [...previous, optimistic]);

      try {
        const result = await client.sendMessage(current.sessionId, text);
        if (mountedRef.current) {
          setMessages((previous) => [...previous, result.reply]);
          setLastMistakes(result.mistakes);
        }
        return true;
      } catch (sendError) {
        if (mountedRef.current) {
          if (isSessionGone(sendError)) {
            applySession(null);
          } else {
            setMessages((previous) => previous.filter((message) => message.id !== optimistic.id));
          }
          setError(getErrorMessage(sendError));
        }
        return false;
      } finally {
        pendingRef.current = false;
        if (mountedRef.current) {
          setPending(null);
        }
      }
    },
    [applySession, client]
  );

  const endLesson = useCallback(async () => {
    const current = sessionRef.current;
    if (!current) {
      return;
    }

    try {
      await client.endLesson(current.sessionId);
    } catch (endError) {
      if (!isSessionGone(endError) && mountedRef.current) {
        setError(getErrorMessage(endError));
      }
    }

    if (mountedRef.current) {
      applySession(null);
    }
  }, [applySession, client]);

  const clearError = useCallback(() => {
    setError(null);
  }, []);

  return {
    session,
    messages,
    pending,
    error,
    lastMistakes,
    startLesson,
    sendMessage,
    endLesson,
    clearError
  };
}
