import type { Interface } from "node:readline";

/**
 * `rl.question` as a promise that settles with null once input ends (Ctrl-D,
 * a closed pipe). A bare `question` never calls back after close.
 */
export function createLinePrompt(rl: Interface): (query: string) => Promise<string | null> {
  let closed = false;
  let pending: ((line: string | null) => void) | undefined;

  rl.once("close", () => {
    closed = true;
    pending?.(null);
    pending = undefined;
  });

  return (query) =>
    new Promise<string | null>((resolve) => {
      if (closed) {
        resolve(null);
        return;
      }
      pending = resolve;
      rl.question(query, (line) => {
        pending = undefined;
        resolve(line);
      });
    });
}
