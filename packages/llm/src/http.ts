// ──────────────────────────────────────────────
// Strata - Provider HTTP Transport
// ──────────────────────────────────────────────

import type { z } from "zod";
import { AdapterError, CancelledError, TransientError } from "@strata/utils";
import { errorFromNetworkFailure, errorFromStatusCode, parseRetryAfter } from "./errors.js";

export interface ProviderRequest {
  provider: string;
  url: string;
  headers?: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * POSTs JSON and validates the response body against `schema`.
 * The request aborts on `timeoutMs` (TransientError) or when the caller's
 * signal fires (CancelledError).
 */
export async function postJson<S extends z.ZodTypeAny>(
  request: ProviderRequest,
  schema: S
): Promise<z.infer<S>> {
  const { provider, url, headers, body, timeoutMs, signal } = request;
  if (signal?.aborted) {
    throw new CancelledError(`${provider} request cancelled before dispatch`);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = () => controller.abort();
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      signal: controller.signal,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorBody = await response.text().catch(() => "Unknown error");
      throw errorFromStatusCode(
        provider,
        response.status,
        errorBody,
        parseRetryAfter(response.headers.get("retry-after"))
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new AdapterError(`${provider} returned a non-JSON response`, { provider, cause: err });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new AdapterError(
        `${provider} returned a malformed response: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`,
        { provider }
      );
    }
    return parsed.data;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      if (timedOut) {
        throw new TransientError(`${provider} API request timed out after ${timeoutMs}ms`);
      }
      throw new CancelledError(`${provider} request cancelled`);
    }
    throw errorFromNetworkFailure(provider, error);
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onCallerAbort);
  }
}
