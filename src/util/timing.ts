import { PipelineTimeoutError } from "../errors.js";

export type TimerResult = {
  label: string;
  ms: number;
};

export async function timeIt<T>(label: string, fn: () => Promise<T>): Promise<{ value: T; timing: TimerResult }> {
  const start = performance.now();
  const value = await fn();
  const end = performance.now();
  return { value, timing: { label, ms: end - start } };
}

export type Deadline = {
  signal: AbortSignal;
  deadlineMs: number;
  expired(): boolean;
  /** Throws PipelineTimeoutError once the deadline or the parent signal has fired. */
  check(): void;
  dispose(): void;
};

export function createDeadline(deadlineMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) controller.abort(parent.reason);
    else parent.addEventListener("abort", onParentAbort, { once: true });
  }

  const handle = setTimeout(() => {
    timedOut = true;
    controller.abort(new PipelineTimeoutError(deadlineMs));
  }, deadlineMs);

  return {
    signal: controller.signal,
    deadlineMs,
    expired: () => timedOut || controller.signal.aborted,
    check() {
      if (controller.signal.aborted) throw new PipelineTimeoutError(deadlineMs, controller.signal.reason);
    },
    dispose() {
      clearTimeout(handle);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}

/**
 * Starts `work` only while the deadline is still open, then races it against
 * the deadline. The loser is not cancelled, only ignored.
 */
export async function withDeadline<T>(deadline: Deadline, work: () => Promise<T>): Promise<T> {
  deadline.check();
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(new PipelineTimeoutError(deadline.deadlineMs, deadline.signal.reason));
    deadline.signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    return await Promise.race([work(), aborted]);
  } finally {
    if (onAbort) deadline.signal.removeEventListener("abort", onAbort);
  }
}
