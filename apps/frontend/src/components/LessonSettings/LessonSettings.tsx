import { PROFICIENCY_LEVELS, SCENARIOS } from "@language-tutor/shared/tutor";
import type { LessonConfig, ProficiencyLevel, Scenario } from "@language-tutor/shared/tutor";
import React, { useState } from "react";

interface LessonSettingsProps {
  onStart: (config: LessonConfig) => Promise<boolean> | void;
  disabled?: boolean;
}

const MISSING_LANGUAGES = "Please specify both languages";

function isProficiencyLevel(value: string): value is ProficiencyLevel {
  return PROFICIENCY_LEVELS.some((level) => level === value);
}

function isScenario(value: string): value is Scenario {
  return SCENARIOS.some((scenario) => scenario === value);
}

export const LessonSettings: React.FC<LessonSettingsProps> = ({ onStart, disabled = false }) => {
  const [nativeLanguage, setNativeLanguage] = useState("");
  const [learningLanguage, setLearningLanguage] = useState("");
  const [proficiencyLevel, setProficiencyLevel] = useState<ProficiencyLevel>("Beginner");
  const [scenario, setScenario] = useState<Scenario>("Restaurant");
  const [validationError, setValidationError] = useState<string | null>(null);

  const handleSubmit = (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();

    const native = nativeLanguage.trim();
    const learning = learningLanguage.trim();
    if (!native || !learning) {
      setValidationError(MISSING_LANGUAGES);
      return;
    }

    setValidationError(null);
    void onStart({ nativeLanguage: native, learningLanguage: learning, proficiencyLevel, scenario });
  };

  return (
    <section aria-labelledby="lesson-settings-heading" className="space-y-4">
      <h2 id="lesson-settings-heading" className="text-lg font-semibold text-gray-900">
        Lesson Settings
      </h2>
      <form className="space-y-3" onSubmit={handleSubmit} noValidate data-testid="lesson-settings-form">
        <div className="grid grid-cols-2 gap-3">
          <label className="flex flex-col text-sm text-gray-700">
            Native Language
            <input
              type="text"
              value={nativeLanguage}
              placeholder="English"
              onChange={(event) => setNativeLanguage(event.target.value)}
              className="mt-1 rounded-md border border-gray-300 px-2 py-1 focus:border-brand-500 focus:outline-none"
            />
          </label>
          <label className="flex flex-col text-sm text-gray-700">
            Target Language
            <input
              type="text"
              value={learningLanguage}
              placeholder="Spanish"
              onChange={(event) => setLearningLanguage(event.target.value)}
              className="mt-1 rounded-md border border-gray-300 px-2 py-1 focus:border-brand-500 focus:outline-none"
            />
          </label>
        </div>

        <label className="flex flex-col text-sm text-gray-700">
          Proficiency
          <select
            value={proficiencyLevel}
            onChange={(event) => {
              if (isProficiencyLevel(event.target.value)) {
                setProficiencyLevel(event.target.value);
              }
            }}
            className="mt-1 rounded-md border border-gray-300 px-2 py-1"
          >
            {PROFICIENCY_LEVELS.map((level) => (
              <option key={level} value={level}>
                {level}
              </option>
            ))}
          </select>
        </label>

        <label className="flex flex-col text-sm text-gray-700">
          Scenario
          <select
            value={scenario}
            onChange={(event) => {
              if (isScenario(event.target.value)) {
                setScenario(event.target.value);
              }
            }}
            className="mt-1 rounded-md border border-gray-300 px-2 py-1"
          >
            {SCENARIOS.map((option) => (
              <option key={option} value={option}>
                {option}
              </option>
            ))}
          </select>
        </label>

        {validationError && (
          <p role="alert" className="text-sm text-red-600">
            {validationError}
          </p>
        )}

        <button
          type="submit"
          disabled={disabled}
          className="w-full rounded-md bg-brand-600 px-3 py-2 font-medium text-white hover:bg-brand-700 disabled:cursor-not-allowed disabled:opacity-60"
        >
          Start Lesson
        </button>
      </form>
    </section>
  );
};
