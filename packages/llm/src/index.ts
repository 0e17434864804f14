// ──────────────────────────────────────────────
// Strata - LLM Package
// ──────────────────────────────────────────────

export { GeminiProvider } from "./gemini-provider.js";
export { GroqProvider } from "./groq-provider.js";
export { createLLMProvider } from "./factory.js";
export { errorFromStatusCode, errorFromNetworkFailure, parseRetryAfter } from "./errors.js";
