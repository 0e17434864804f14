import test from "node:test";
import assert from "node:assert/strict";
import {
  AdapterError,
  CancelledError,
  TransientError,
  ValidationError,
} from "@strata/utils";
import { computeBackoffDelay, runNode } from "./node-runner.js";
import { node, silentLogger } from "./test-helpers.js";

const policy = { maxAttempts: 5, backoffBaseMs: 100, backoffCapMs: 1000 };
const noBackoff = { maxAttempts: 3, backoffBaseMs: 0, backoffCapMs: 0 };

test("backoff doubles per attempt, caps, and jitters into the upper half", () => {
  assert.equal(computeBackoffDelay(1, policy, () => 0), 50);
  assert.equal(computeBackoffDelay(1, policy, () => 1), 100);
  assert.equal(computeBackoffDelay(4, policy, () => 0.5), 600);
  assert.equal(computeBackoffDelay(5, policy, () => 0), 500);
  assert.equal(computeBackoffDelay(9, policy, () => 1), 1000);
});

test("retry-after hints raise the delay up to the cap", () => {
  const hinted = new TransientError("rate limited", { retryAfterMs: 700 });
  const tooLong = new TransientError("rate limited", { retryAfterMs: 5000 });

  assert.equal(computeBackoffDelay(1, policy, () => 0, hinted), 700);
  assert.equal(computeBackoffDelay(1, policy, () => 0, tooLong), 1000);
});

test("an always-transient step is invoked exactly maxAttempts times", async () => {
  let invocations = 0;
  const outcome = await runNode({
    node: node("flaky", [], { retryPolicy: noBackoff }),
    signal: new AbortController().signal,
    logger: silentLogger,
    invoke: async () => {
      invocations += 1;
      throw new TransientError("upstream busy");
    },
  });

  assert.equal(invocations, 3);
  assert.equal(outcome.status, "failed");
  assert.ok(outcome.error instanceof TransientError);
  assert.deepEqual(
    outcome.attempts.map((attempt) => attempt.status),
    ["retry", "retry", "failed"]
  );
  assert.deepEqual(
    outcome.attempts.map((attempt) => attempt.reason),
    ["upstream busy", "upstream busy", "upstream busy"]
  );
});

test("a transient failure followed by success succeeds", async () => {
  let invocations = 0;
  const outcome = await runNode({
    node: node("recovering", [], { retryPolicy: noBackoff }),
    signal: new AbortController().signal,
    logger: silentLogger,
    invoke: async (attempt) => {
      invocations += 1;
      if (attempt === 1) throw new TransientError("blip");
      return { attempt };
    },
  });

  assert.equal(invocations, 2);
  assert.equal(outcome.status, "succeeded");
  assert.deepEqual(outcome.output, { attempt: 2 });
  assert.deepEqual(
    outcome.attempts.map((attempt) => attempt.status),
    ["retry", "succeeded"]
  );
});

test("terminal errors are not retried", async () => {
  let invocations = 0;
  const outcome = await runNode({
    node: node("bad-config", [], { retryPolicy: noBackoff }),
    signal: new AbortController().signal,
    logger: silentLogger,
    invoke: async () => {
      invocations += 1;
      throw new ValidationError("template is required");
    },
  });

  assert.equal(invocations, 1);
  assert.ok(outcome.error instanceof ValidationError);
});

test("unclassified errors become adapter errors", async () => {
  const outcome = await runNode({
    node: node("boom", [], { retryPolicy: noBackoff }),
    signal: new AbortController().signal,
    logger: silentLogger,
    invoke: async () => {
      throw new Error("boom");
    },
  });

  assert.ok(outcome.error instanceof AdapterError);
  assert.equal(outcome.error.message, "custom step failed: boom");
  assert.equal(outcome.attempts.length, 1);
});

test("a timed-out attempt is transient and aborts the step's signal", async () => {
  const signals: AbortSignal[] = [];
  const outcome = await runNode({
    node: node("slow", [], {
      timeoutMs: 20,
      retryPolicy: { maxAttempts: 2, backoffBaseMs: 0, backoffCapMs: 0 },
    }),
    signal: new AbortController().signal,
    logger: silentLogger,
    invoke: (_attempt, signal) => {
      signals.push(signal);
      return new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
    },
  });

  assert.equal(signals.length, 2);
  assert.ok(signals.every((signal) => signal.aborted));
  assert.ok(outcome.error instanceof TransientError);
  assert.equal(outcome.error.message, 'Node "slow" timed out after 20ms (attempt 2)');
});

test("run abort during an attempt cancels immediately", async () => {
  const controller = new AbortController();
  const started = Date.now();
  const outcome = await runNode({
    node: node("long", [], { timeoutMs: 10_000, retryPolicy: noBackoff }),
    signal: controller.signal,
    logger: silentLogger,
    invoke: () => {
      setTimeout(() => controller.abort(new CancelledError("stop")), 5);
      return new Promise(() => undefined);
    },
  });

  assert.ok(Date.now() - started < 5_000);
  assert.ok(outcome.error instanceof CancelledError);
  assert.equal(outcome.error.message, "stop");
  assert.equal(outcome.attempts.length, 1);
});

test("run abort during backoff cancels without another attempt", async () => {
  const controller = new AbortController();
  let invocations = 0;
  const outcome = await runNode({
    node: node("backing-off", [], {
      retryPolicy: { maxAttempts: 3, backoffBaseMs: 10_000, backoffCapMs: 10_000 },
    }),
    signal: controller.signal,
    logger: silentLogger,
    onAttempt: (_attempt, phase) => {
      if (phase === "backoff") controller.abort(new CancelledError("stop"));
    },
    invoke: async () => {
      invocations += 1;
      throw new TransientError("busy");
    },
  });

  assert.equal(invocations, 1);
  assert.ok(outcome.error instanceof CancelledError);
  assert.equal(outcome.error.message, "stop");
});

test("a cancellation the run did not request is retried as transient", async () => {
  let invocations = 0;
  const outcome = await runNode({
    node: node("waiter", [], { retryPolicy: noBackoff }),
    signal: new AbortController().signal,
    logger: silentLogger,
    invoke: async () => {
      invocations += 1;
      if (invocations === 1) throw new CancelledError("shared request cancelled");
      return "ok";
    },
  });

  assert.equal(outcome.status, "succeeded");
  assert.equal(outcome.output, "ok");
  assert.deepEqual(
    outcome.attempts.map((attempt) => [attempt.status, attempt.reason]),
    [
      ["retry", "custom step was interrupted: shared request cancelled"],
      ["succeeded", null],
    ]
  );
});
