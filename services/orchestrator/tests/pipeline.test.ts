import { describe, expect, it, vi } from "vitest";

import { PipelineError } from "../src/errors.js";
import { AdmissionGate } from "../src/pipeline/admission.js";
import { withDeadline } from "../src/pipeline/deadline.js";
import { retryOnce } from "../src/pipeline/retry.js";
import { IllegalTransitionError, MEDIA_TRANSITIONS, PipelineRun, TEXT_TRANSITIONS } from "../src/pipeline/run-state.js";
import type { MediaState, TextState } from "../src/pipeline/run-state.js";
import { deferred, untilAborted } from "./support.js";

describe("AdmissionGate", () => {
  it("queues callers beyond the concurrency limit and turns away the overflow", async () => {
    const gate = new AdmissionGate("detection", "inference", { maxConcurrent: 1, maxQueue: 1, queueTimeoutMs: 1_000 });
    const first = deferred<string>();
    const order: string[] = [];

    const running = gate.run(async () => {
      order.push("first");
      return first.promise;
    });
    const queued = gate.run(async () => {
      order.push("second");
      return "second";
    });
    const rejected = gate.run(async () => "third");

    await expect(rejected).rejects.toMatchObject({
      kind: "CapacityExceeded",
      stage: "inference",
      message: "detection backend is at capacity: queue is full",
    });
    expect(gate.inFlight).toBe(1);
    expect(gate.waiting).toBe(1);

    first.resolve("first");
    await expect(running).resolves.toBe("first");
    await expect(queued).resolves.toBe("second");
    expect(order).toEqual(["first", "second"]);
    expect(gate.inFlight).toBe(0);
    expect(gate.waiting).toBe(0);
  });

  it("gives up on a queued caller after the queue timeout", async () => {
    const gate = new AdmissionGate("detection", "inference", { maxConcurrent: 1, maxQueue: 4, queueTimeoutMs: 20 });
    const first = deferred<void>();
    const running = gate.run(() => first.promise);
    const task = vi.fn(async () => "never");

    await expect(gate.run(task)).rejects.toMatchObject({
      kind: "CapacityExceeded",
      message: "detection backend is at capacity: timed out waiting for a slot",
    });
    expect(task).not.toHaveBeenCalled();
    expect(gate.waiting).toBe(0);

    first.resolve();
    await running;
    expect(gate.inFlight).toBe(0);
  });

  it("removes a queued caller whose signal aborts", async () => {
    const gate = new AdmissionGate("summarization", "summarize", { maxConcurrent: 1, maxQueue: 4, queueTimeoutMs: 1_000 });
    const first = deferred<void>();
    const running = gate.run(() => first.promise);
    const controller = new AbortController();
    const reason = new Error("cancelled");

    const queued = gate.run(async () => "never", controller.signal);
    controller.abort(reason);

    await expect(queued).rejects.toBe(reason);
    expect(gate.waiting).toBe(0);
    first.resolve();
    await running;
  });

  it("releases the slot when a task fails", async () => {
    const gate = new AdmissionGate("detection", "inference", { maxConcurrent: 1, maxQueue: 0, queueTimeoutMs: 1_000 });

    await expect(gate.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(gate.run(async () => "ok")).resolves.toBe("ok");
  });
});

describe("retryOnce", () => {
  const transient = () => new PipelineError("Transient", "fetch", "store unreachable");

  it("retries a retryable failure once", async () => {
    const operation = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce("bytes");
    const onRetry = vi.fn();

    await expect(retryOnce(operation, { backoffMs: 0, onRetry })).resolves.toBe("bytes");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it("surfaces the second failure instead of trying a third time", async () => {
    const second = transient();
    const operation = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(second)
      .mockResolvedValue("bytes");

    await expect(retryOnce(operation, { backoffMs: 0 })).rejects.toBe(second);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("retries an inference failure that callers may not retry", async () => {
    const failure = new PipelineError("InferenceFailure", "inference", "Detector failed (500)");
    const operation = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce("detections");

    await expect(retryOnce(operation, { backoffMs: 0 })).resolves.toBe("detections");
    expect(failure.retryable).toBe(false);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(
      new PipelineError("NotFound", "fetch", "Object s3://media/a.png not found"),
    );

    await expect(retryOnce(operation, { backoffMs: 0 })).rejects.toMatchObject({ kind: "NotFound" });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("does not retry unclassified errors", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new TypeError("bad"));

    await expect(retryOnce(operation, { backoffMs: 0 })).rejects.toThrow(TypeError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("does not retry once the signal has aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(transient());

    await expect(retryOnce(operation, { backoffMs: 0, signal: controller.signal })).rejects.toMatchObject({
      kind: "Transient",
    });
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("withDeadline", () => {
  it("returns the task's result when it finishes in time", async () => {
    await expect(withDeadline(1_000, () => new Error("late"), async () => 42)).resolves.toBe(42);
  });

  it("aborts the task with the expiry error", async () => {
    const expired = new PipelineError("Timeout", "inference", "Request exceeded 10ms while inferring");
    let seen: AbortSignal | undefined;

    await expect(
      withDeadline(10, () => expired, (signal) => {
        seen = signal;
        return untilAborted<number>(signal);
      }),
    ).rejects.toBe(expired);
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBe(expired);
  });
});

describe("PipelineRun", () => {
  it("records a successful media run", () => {
    const run = new PipelineRun<MediaState>("run-1", MEDIA_TRANSITIONS, "Received", "Failed");

    run.enter("Fetching");
    run.enter("Decoding");
    run.enter("Inferring");
    run.enter("Normalizing");
    run.enter("Completed");

    expect(run.history).toEqual(["Received", "Fetching", "Decoding", "Inferring", "Normalizing", "Completed"]);
    expect(run.finished).toBe(true);
  });

  it("rejects skipped stages", () => {
    const run = new PipelineRun<MediaState>("run-2", MEDIA_TRANSITIONS, "Received", "Failed");
    run.enter("Fetching");

    expect(() => run.enter("Inferring")).toThrow(IllegalTransitionError);
    expect(() => run.enter("Inferring")).toThrow("Illegal pipeline transition Fetching -> Inferring");
    expect(run.state).toBe("Fetching");
  });

  it("fails from any active state but not after completion", () => {
    const failing = new PipelineRun<TextState>("run-3", TEXT_TRANSITIONS, "Received", "Failed");
    failing.enter("Summarizing");
    failing.fail();
    expect(failing.state).toBe("Failed");

    const done = new PipelineRun<TextState>("run-4", TEXT_TRANSITIONS, "Received", "Failed");
    done.enter("Summarizing");
    done.enter("Completed");
    done.fail();
    expect(done.state).toBe("Completed");
  });

  it("lets plain text skip fetching", () => {
    const run = new PipelineRun<TextState>("run-5", TEXT_TRANSITIONS, "Received", "Failed");

    run.enter("Summarizing");

    expect(run.finished).toBe(false);
    expect(run.history).toEqual(["Received", "Summarizing"]);
  });
});
