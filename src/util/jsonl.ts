import fs from "node:fs";
import readline from "node:readline";
import type { ZodType } from "zod";

import { ensureParentDir } from "./fs.js";

/** Yields parsed lines; lines failing `schema` are reported through `onInvalid` and skipped. */
export async function* readJsonl<T>(
  filePath: string,
  schema: ZodType<T>,
  onInvalid?: (lineNo: number, reason: string) => void
): AsyncGenerator<T> {
  const stream = fs.createReadStream(filePath, { encoding: "utf8" });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  let lineNo = 0;
  for await (const line of rl) {
    lineNo += 1;
    const trimmed = line.trim();
    if (!trimmed) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (err) {
      onInvalid?.(lineNo, err instanceof Error ? err.message : String(err));
      continue;
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      onInvalid?.(lineNo, parsed.error.issues.map((i) => i.message).join("; "));
      continue;
    }
    yield parsed.data;
  }
}

export function appendJsonl(filePath: string, value: unknown): void {
  ensureParentDir(filePath);
  fs.appendFileSync(filePath, `${JSON.stringify(value)}\n`, "utf8");
}
