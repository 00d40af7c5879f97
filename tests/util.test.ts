import readline from "node:readline";
import { PassThrough } from "node:stream";
import { describe, expect, test, vi } from "vitest";

import { PipelineTimeoutError } from "../src/errors.js";
import { createLogger, sanitizeForLog } from "../src/util/log.js";
import type { LogRecord } from "../src/util/log.js";
import { KeyedMutex } from "../src/util/mutex.js";
import { createLinePrompt } from "../src/util/prompt.js";
import { createDeadline, withDeadline } from "../src/util/timing.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("KeyedMutex", () => {
  test("serializes work per key and runs different keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const job = (key: string, name: string, ms: number) =>
      mutex.run(key, async () => {
        events.push(`start ${name}`);
        await sleep(ms);
        events.push(`end ${name}`);
        return name;
      });

    const results = await Promise.all([job("a", "a1", 20), job("a", "a2", 1), job("b", "b1", 5)]);
    expect(results).toEqual(["a1", "a2", "b1"]);
    expect(events.indexOf("start a2")).toBeGreaterThan(events.indexOf("end a1"));
    expect(events.indexOf("end b1")).toBeLessThan(events.indexOf("end a1"));
    expect(mutex.activeKeys).toBe(0);
  });

  test("a failed task releases the lock", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.run("a", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.run("a", () => 42)).resolves.toBe(42);
  });
});

describe("deadline", () => {
  test("passes results through before the deadline", async () => {
    const deadline = createDeadline(1_000);
    await expect(withDeadline(deadline, () => Promise.resolve("ok"))).resolves.toBe("ok");
    deadline.dispose();
  });

  test("rejects with PipelineTimeoutError once it fires", async () => {
    const deadline = createDeadline(10);
    await expect(withDeadline(deadline, () => sleep(200))).rejects.toBeInstanceOf(PipelineTimeoutError);
    expect(deadline.expired()).toBe(true);
    expect(() => deadline.check()).toThrow("Request exceeded its 10ms deadline");
    deadline.dispose();
  });

  test("an already aborted parent never starts the work", async () => {
    const parent = new AbortController();
    parent.abort(new Error("caller went away"));
    const deadline = createDeadline(1_000, parent.signal);
    const work = vi.fn(async () => {
      throw new Error("AbortError from provider");
    });
    await expect(withDeadline(deadline, work)).rejects.toBeInstanceOf(PipelineTimeoutError);
    expect(work).not.toHaveBeenCalled();
    deadline.dispose();
  });

  test("follows a parent signal", () => {
    const parent = new AbortController();
    const deadline = createDeadline(1_000, parent.signal);
    parent.abort();
    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });
});

describe("createLinePrompt", () => {
  test("answers lines, then settles with null once input ends", async () => {
    const input = new PassThrough();
    const rl = readline.createInterface({ input, output: new PassThrough(), terminal: false });
    const ask = createLinePrompt(rl);

    const first = ask("> ");
    input.write("/memory\n");
    expect(await first).toBe("/memory");

    const second = ask("> ");
    input.end();
    expect(await second).toBeNull();
    expect(await ask("> ")).toBeNull();
  });
});

describe("logger", () => {
  test("filters by level and merges child bindings", () => {
    const records: LogRecord[] = [];
    const logger = createLogger({ level: "info", sinks: [(r) => records.push(r)], bindings: { service: "kb-router" } });
    logger.debug("hidden");
    logger.child({ requestId: "r1" }).info("request.completed", { route: "corpus" });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: "info", event: "request.completed", service: "kb-router", requestId: "r1", route: "corpus" });
  });

  test("a throwing sink does not break logging", () => {
    const records: LogRecord[] = [];
    const logger = createLogger({
      sinks: [
        () => {
          throw new Error("disk full");
        },
        (r) => records.push(r)
      ]
    });
    logger.warn("still.logged");
    expect(records.map((r) => r.event)).toEqual(["still.logged"]);
  });

  test("sanitizes user text", () => {
    expect(sanitizeForLog("line one\nline two", 100)).toBe("line one line two");
    expect(sanitizeForLog("abcdef", 3)).toBe("abc…");
  });
});
