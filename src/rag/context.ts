import { PromptTemplate } from "@langchain/core/prompts";

import type { Chunk } from "../retrieval/types.js";

export const NO_DOCUMENTS_MESSAGE =
  "No documents have been indexed yet. Please index your documents first.";

export const NO_RESPONSE_MESSAGE = "No response received.";

const GROUNDED_PROMPT = PromptTemplate.fromTemplate(
  `Use only the following context from the indexed documents to answer the question.

Context:
{context}

Question: {question}

Answer:`
);

export function buildContext(chunks: readonly Chunk[]): string {
  return chunks.map((c) => `[Source: ${c.source}]\n${c.text}`).join("\n\n");
}

export async function buildPrompt(params: {
  question: string;
  chunks: readonly Chunk[];
}): Promise<string> {
  return GROUNDED_PROMPT.format({
    context: buildContext(params.chunks),
    question: params.question
  });
}
