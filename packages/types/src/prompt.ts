// ──────────────────────────────────────────────
// Strata - Prompt Types
// ──────────────────────────────────────────────

export interface PromptTemplate {
  name: string;
  // `{{context}}` and `{{history}}` are filled by the assembler;
  // any other `{{placeholder}}` must be supplied as a variable.
  text: string;
  tokenBudget: number;
}

export type ConversationRole = "system" | "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface AssembledPrompt {
  template: string;
  text: string;
  tokenCount: number;
  includedChunks: number;
  includedHistory: number;
  droppedChunks: number;
  droppedHistory: number;
}

export const CONTEXT_PLACEHOLDER = "context";
export const HISTORY_PLACEHOLDER = "history";
