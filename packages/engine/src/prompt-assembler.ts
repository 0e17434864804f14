// ──────────────────────────────────────────────
// Strata - Prompt Assembler
// Renders a template with retrieved context and history under a token budget
// ──────────────────────────────────────────────

import type {
  AssembledPrompt,
  Chunk,
  ConversationTurn,
  PromptTemplate,
  RetrievalResult,
} from "@strata/types";
import { CONTEXT_PLACEHOLDER, HISTORY_PLACEHOLDER } from "@strata/types";
import { BudgetExceededError, ValidationError, estimateTokens } from "@strata/utils";
import { compareChunks } from "./retrieval.js";

const PLACEHOLDER_PATTERN = /\{\{\s*([\w.-]+)\s*\}\}/g;

export interface AssemblePromptInput {
  template: PromptTemplate;
  retrieval?: RetrievalResult | null;
  history?: readonly ConversationTurn[];
  variables?: Readonly<Record<string, unknown>>;
}

export function templatePlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined) names.add(name);
  }
  return [...names];
}

export function formatChunks(chunks: readonly Chunk[]): string {
  return chunks
    .map(
      (chunk, index) =>
        `[${index + 1}] (${chunk.documentId}:${chunk.range.start}-${chunk.range.end}, score=${chunk.score.toFixed(4)})\n${chunk.text}`
    )
    .join("\n\n");
}

export function formatHistory(history: readonly ConversationTurn[]): string {
  return history.map((turn) => `${turn.role}: ${turn.content}`).join("\n");
}

/**
 * Renders `template` and trims it into its token budget: oldest history
 * turns go first, then the lowest-scored chunks, one at a time. Throws
 * BudgetExceededError when the template alone, with empty context and
 * history, is already over budget.
 */
export function assemblePrompt(input: AssemblePromptInput): AssembledPrompt {
  const { template } = input;
  const variables = input.variables ?? {};

  const values = new Map<string, string>();
  for (const name of templatePlaceholders(template.text)) {
    if (name === CONTEXT_PLACEHOLDER || name === HISTORY_PLACEHOLDER) continue;
    const value = variables[name];
    if (value === undefined || value === null) {
      throw new ValidationError(
        `Template "${template.name}" requires variable "${name}"`,
        [name]
      );
    }
    values.set(name, typeof value === "string" ? value : JSON.stringify(value));
  }

  const render = (chunks: readonly Chunk[], history: readonly ConversationTurn[]): string =>
    template.text.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
      if (name === CONTEXT_PLACEHOLDER) return formatChunks(chunks);
      if (name === HISTORY_PLACEHOLDER) return formatHistory(history);
      return values.get(name) ?? placeholder;
    });

  const fixedTokens = estimateTokens(render([], []));
  if (fixedTokens > template.tokenBudget) {
    throw new BudgetExceededError(fixedTokens, template.tokenBudget, `template "${template.name}"`);
  }

  const chunks = [...(input.retrieval?.chunks ?? [])].sort(compareChunks);
  const history = [...(input.history ?? [])];
  let droppedChunks = 0;
  let droppedHistory = 0;

  while (true) {
    const text = render(chunks, history);
    const tokenCount = estimateTokens(text);
    if (tokenCount <= template.tokenBudget || (chunks.length === 0 && history.length === 0)) {
      return {
        template: template.name,
        text,
        tokenCount,
        includedChunks: chunks.length,
        includedHistory: history.length,
        droppedChunks,
        droppedHistory,
      };
    }

    if (history.length > 0) {
      history.shift();
      droppedHistory += 1;
    } else {
      chunks.pop();
      droppedChunks += 1;
    }
  }
}
