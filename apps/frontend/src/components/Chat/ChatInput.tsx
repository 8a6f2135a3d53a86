import React, { useState } from "react";

interface ChatInputProps {
  onSend: (content: string) => Promise<boolean>;
  disabled?: boolean;
}

export const ChatInput: React.FC<ChatInputProps> = ({ onSend, disabled = false }) => {
  const [draft, setDraft] = useState("");

  const submit = async () => {
    const content = draft.trim();
    if (!content || disabled) {
      return;
    }

    setDraft("");
    const sent = await onSend(content);
    if (!sent) {
      setDraft(content);
    }
  };

  const handleSubmit = (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    void submit();
  };

  return (
    <form className="flex gap-2" onSubmit={handleSubmit} data-testid="chat-input-form">
      <label htmlFor="chat-input" className="sr-only">
        Message
      </label>
      <input
        id="chat-input"
        type="text"
        value={draft}
        disabled={disabled}
        placeholder="Type your message..."
        onChange={(event) => setDraft(event.target.value)}
        className="flex-1 rounded-md border border-gray-300 px-3 py-2 focus:border-brand-500 focus:outline-none disabled:bg-gray-100"
      />
      <button
        type="submit"
        disabled={disabled || draft.trim().length === 0}
        className="rounded-md bg-brand-600 px-4 py-2 font-medium text-white hover:bg-brand-700 disabled:cursor-not-allowed disabled:opacity-60"
      >
        Send
      </button>
    </form>
  );
};
