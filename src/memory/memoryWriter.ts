import crypto from "node:crypto";

import { errorKind } from "../errors.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import type { CompletedTurn, MemorySink } from "./sinks.js";

export type TurnPair = {
  requestId: string;
  userId: string;
  sessionId: string;
  query: string;
  answer: string;
  now?: Date;
};

export type MemoryWriteReport = { attempted: number; stored: number; dropped: number };

/**
 * Records finished exchanges to every sink after the response has gone out.
 * Failures are logged and dropped; losing a memory entry never fails a request.
 */
export class MemoryWriter {
  private readonly sinks: readonly MemorySink[];
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<MemoryWriteReport>>();

  constructor(sinks: MemorySink[], opts: { logger?: Logger } = {}) {
    this.sinks = [...sinks];
    this.logger = opts.logger ?? silentLogger;
  }

  get sinkKinds(): string[] {
    return this.sinks.map((s) => s.kind);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** The user turn, then the assistant turn one millisecond later. */
  buildTurns(pair: TurnPair): [CompletedTurn, CompletedTurn] {
    const at = (pair.now ?? new Date()).getTime();
    const base = { requestId: pair.requestId, userId: pair.userId, sessionId: pair.sessionId };
    return [
      { ...base, turnId: crypto.randomUUID(), role: "user", text: pair.query, timestamp: new Date(at) },
      { ...base, turnId: crypto.randomUUID(), role: "assistant", text: pair.answer, timestamp: new Date(at + 1) }
    ];
  }

  /** Fire-and-forget: starts on a later tick and never throws into the caller. */
  schedule(pair: TurnPair, logger: Logger = this.logger): void {
    const task: Promise<MemoryWriteReport> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.write(pair, logger))
      .catch((err: unknown): MemoryWriteReport => {
        logger.error("memory.write.crashed", { error: err, errorKind: errorKind(err) });
        return { attempted: 0, stored: 0, dropped: 0 };
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  async write(pair: TurnPair, logger: Logger = this.logger): Promise<MemoryWriteReport> {
    const report: MemoryWriteReport = { attempted: 0, stored: 0, dropped: 0 };
    for (const turn of this.buildTurns(pair)) {
      for (const sink of this.sinks) {
        report.attempted += 1;
        try {
          await sink.append(turn);
          report.stored += 1;
        } catch (err) {
          report.dropped += 1;
          logger.warn("memory.write.dropped", {
            sink: sink.kind,
            role: turn.role,
            turnId: turn.turnId,
            errorKind: errorKind(err),
            error: err
          });
        }
      }
    }
    logger.debug("memory.write.completed", { ...report });
    return report;
  }

  /** Resolves once every scheduled write has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}
