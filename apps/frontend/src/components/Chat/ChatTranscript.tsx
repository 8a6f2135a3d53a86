import type { ChatMessage, MistakeRecord } from "@language-tutor/shared/tutor";
import React, { useEffect, useRef } from "react";

interface ChatTranscriptProps {
  messages: ChatMessage[];
  pendingLabel?: string | null;
  lastMistakes?: MistakeRecord[];
}

const ROLE_LABELS: Record<ChatMessage["role"], string> = {
  user: "You",
  assistant: "Tutor"
};

export const ChatTranscript: React.FC<ChatTranscriptProps> = ({ messages, pendingLabel = null, lastMistakes = [] }) => {
  const endRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView?.({ block: "end" });
  }, [messages.length, pendingLabel]);

  return (
    <div className="space-y-3" data-testid="chat-transcript">
      <ol className="space-y-3" aria-label="Conversation">
        {messages.map((message) => (
          <li
            key={message.id}
            data-role={message.role}
            className={
              message.role === "user"
                ? "ml-auto max-w-[80%] rounded-xl bg-brand-600 px-4 py-2 text-white"
                : "mr-auto max-w-[80%] rounded-xl bg-white px-4 py-2 text-gray-900 shadow"
            }
          >
            <span className="sr-only">{ROLE_LABELS[message.role]}: </span>
            <p className="whitespace-pre-wrap">{message.content}</p>
          </li>
        ))}
      </ol>

      {lastMistakes.length > 0 && (
        <aside aria-label="Corrections noted" className="rounded-md border border-amber-200 bg-amber-50 px-4 py-2 text-sm">
          <ul className="space-y-1">
            {lastMistakes.map((mistake) => (
              <li key={mistake.id}>
                Noted {mistake.errorType} mistake: <code>{mistake.errorSentence}</code> →{" "}
                <code>{mistake.correctedSentence}</code>
              </li>
            ))}
          </ul>
        </aside>
      )}

      {pendingLabel && (
        <p role="status" className="text-sm italic text-gray-500">
          {pendingLabel}
        </p>
      )}
      <div ref={endRef} />
    </div>
  );
};
