import React from "react";

export type HeaderView = "lesson" | "feedback";

interface HeaderProps {
  current: HeaderView;
}

const LINKS: Array<{ view: HeaderView; href: string; label: string }> = [
  { view: "lesson", href: "/", label: "Lesson" },
  { view: "feedback", href: "/feedback", label: "Feedback" }
];

export const Header: React.FC<HeaderProps> = ({ current }) => {
  return (
    <header className="border-b border-gray-200 bg-white">
      <div className="mx-auto flex max-w-6xl items-center justify-between px-6 py-4">
        <a href="/" className="text-xl font-semibold text-gray-900 focus:outline-none focus:ring-2 focus:ring-brand-500">
          Language Learning Chatbot
        </a>
        <nav aria-label="Primary">
          <ul className="flex gap-4">
            {LINKS.map((link) => (
              <li key={link.view}>
                <a
                  href={link.href}
                  aria-current={link.view === current ? "page" : undefined}
                  className={
                    link.view === current
                      ? "font-medium text-brand-700 underline"
                      : "text-gray-600 hover:text-brand-600"
                  }
                >
                  {link.label}
                </a>
              </li>
            ))}
          </ul>
        </nav>
      </div>
    </header>
  );
};
