import type { LessonConfig } from "@language-tutor/shared/tutor";

import type { ToolDefinition } from "./chat-completion.client.js";

export const LOG_MISTAKE_TOOL_NAME = "log_mistake" as const;
export const FOLLOW_UP_INPUT = "Continue the conversation naturally" as const;

export function buildLessonOpener(config: LessonConfig): string {
	return `Begin ${config.scenario} scenario`;
}

export function buildSystemPrompt(config: LessonConfig): string {
	const { learningLanguage, nativeLanguage, proficiencyLevel, scenario } = config;

	return `You are a ${learningLanguage} language tutor. Follow these rules STRICTLY:

1. MISTAKE HANDLING (HIGHEST PRIORITY):
   - When an error is detected:
     1. Immediately call the ${LOG_MISTAKE_TOOL_NAME} tool with:
        - native_lang: ${nativeLanguage}
        - target_lang: ${learningLanguage}
        - error_sentence: the exact erroneous text
        - corrected_sentence: the full corrected sentence
        - error_type: grammar, vocabulary, pronunciation or syntax
     2. Show the correction: (Note: [Mistake] → [Correction])
     3. Continue the conversation naturally

2. RESPONSE STRUCTURE FOR ERRORS:
   (Note: [Mistake] → [Correction])
   [Follow-up in ${learningLanguage}]
   ([${nativeLanguage} translation])

3. PROHIBITED ACTIONS:
   - Never mention that you are logging errors
   - Never wait for confirmation after a correction
   - Never break the conversation flow for logging

4. ADAPTATION:
   - Proficiency: ${proficiencyLevel}
   - Scenario: ${scenario}
   - Native language: ${nativeLanguage}`;
}

export const LOG_MISTAKE_TOOL: ToolDefinition = {
	type: "function",
	function: {
		name: LOG_MISTAKE_TOOL_NAME,
		description:
			"Mandatory error logger. Call immediately whenever the learner makes a mistake in the language being learned.",
		parameters: {
			type: "object",
			properties: {
				native_lang: {
					type: "string",
					description: "The learner's native language (e.g. \"English\")"
				},
				target_lang: {
					type: "string",
					description: "The language being learned (e.g. \"Spanish\")"
				},
				error_sentence: {
					type: "string",
					description: "The original incorrect sentence, in full"
				},
				corrected_sentence: {
					type: "string",
					description: "The corrected sentence, in full"
				},
				error_type: {
					type: "string",
					enum: ["grammar", "vocabulary", "pronunciation", "syntax"],
					description: "Error category"
				}
			},
			required: ["native_lang", "target_lang", "error_sentence", "corrected_sentence", "error_type"]
		}
	}
};
