export * from "./utils/uuid.js";
export * from "./tutor/index.js";
export * from "./contracts/api.js";

export interface ProjectSummary {
  name: string;
  description: string;
  principles: string[];
}

export function describeProject(): ProjectSummary {
  return {
    name: "Language Tutor",
    description:
      "Chat-based language tutoring: converse with a model, log the mistakes it corrects, review error trends.",
    principles: [
      "Conversation first, corrections inline",
      "Every correction is recorded locally",
      "Feedback is derived from the learner's own mistakes"
    ]
  };
}
