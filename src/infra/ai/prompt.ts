import { detectLanguage } from "../../pipelines/answering.js";
import type { AnswerPrompt } from "./types.js";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export function buildAnswerMessages(prompt: AnswerPrompt): ChatMessage[] {
  const language = detectLanguage(prompt.question) === "id" ? "Indonesian" : "English";
  return [
    {
      role: "system",
      content: [
        "You are a portfolio assistant answering in first person on behalf of the portfolio owner.",
        "Answer only from the provided context.",
        "If the context does not cover the question, say so and suggest a related topic.",
        `Respond only in ${language}.`,
        "Keep the answer under 6 sentences.",
      ].join(" "),
    },
    {
      role: "user",
      content: `Topic: ${prompt.category}\n\nQuestion:\n${prompt.question}\n\nContext:\n${prompt.context || "(no context)"}`,
    },
  ];
}
