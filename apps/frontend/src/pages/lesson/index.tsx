import React from "react";

import { defaultTutorClient } from "../../api/tutorClient";
import type { TutorApi } from "../../api/tutorClient";
import { ChatInput } from "../../components/Chat/ChatInput";
import { ChatTranscript } from "../../components/Chat/ChatTranscript";
import { ErrorLog } from "../../components/ErrorLog/ErrorLog";
import { Header } from "../../components/Header/Header";
import { LessonSettings } from "../../components/LessonSettings/LessonSettings";
import { useLessonSession } from "../../hooks/useLessonSession";
import { useMistakeLog } from "../../hooks/useMistakeLog";
import { useTutorHealth } from "../../hooks/useTutorHealth";

interface LessonPageProps {
  client?: TutorApi;
}

const PENDING_LABELS = {
  starting: "Preparing first lesson...",
  replying: "Thinking..."
} as const;

export const LessonPage: React.FC<LessonPageProps> = ({ client = defaultTutorClient }) => {
  const lesson = useLessonSession(client);
  const mistakeLog = useMistakeLog(client);
  const { health, error: healthError } = useTutorHealth(client);
  const pendingLabel = lesson.pending ? PENDING_LABELS[lesson.pending] : null;

  return (
    <>
      <Header current="lesson" />
      <div className="mx-auto flex max-w-6xl flex-col gap-6 p-6 md:flex-row">
        <aside className="space-y-8 md:w-80" aria-label="Sidebar">
          <LessonSettings onStart={lesson.startLesson} disabled={lesson.pending !== null} />
          <ErrorLog
            mistakes={mistakeLog.mistakes}
            loaded={mistakeLog.loaded}
            loading={mistakeLog.loading}
            error={mistakeLog.error}
            onView={() => void mistakeLog.load()}
          />
        </aside>

        <main className="flex flex-1 flex-col gap-4">
          {health && !health.llmConfigured && (
            <p role="status" className="rounded-md bg-amber-50 px-4 py-2 text-sm text-amber-800">
              The language model is not configured. Set OPENAI_API_KEY on the tutor service to start lessons.
            </p>
          )}
          {healthError && (
            <p role="status" className="rounded-md bg-amber-50 px-4 py-2 text-sm text-amber-800">
              Tutor service unavailable: {healthError}
            </p>
          )}

          {lesson.session && (
            <div className="flex items-center justify-between text-sm text-gray-600">
              <p>
                {lesson.session.config.learningLanguage} · {lesson.session.config.proficiencyLevel} ·{" "}
                {lesson.session.config.scenario}
              </p>
              <button type="button" onClick={() => void lesson.endLesson()} className="underline hover:text-brand-700">
                End Lesson
              </button>
            </div>
          )}

          {lesson.error && (
            <div role="alert" className="flex items-start justify-between rounded-md bg-red-50 px-4 py-2 text-sm text-red-700">
              <span>{lesson.error}</span>
              <button type="button" onClick={lesson.clearError} aria-label="Dismiss error" className="ml-4">
                ×
              </button>
            </div>
          )}

          {lesson.session || lesson.messages.length > 0 || pendingLabel ? (
            <ChatTranscript messages={lesson.messages} pendingLabel={pendingLabel} lastMistakes={lesson.lastMistakes} />
          ) : (
            <p className="rounded-md bg-brand-50 px-4 py-3 text-brand-900">Configure your lesson in the sidebar to begin</p>
          )}

          {lesson.session && <ChatInput onSend={lesson.sendMessage} disabled={lesson.pending !== null} />}
        </main>
      </div>
    </>
  );
};
