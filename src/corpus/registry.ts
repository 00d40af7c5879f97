import path from "node:path";

import { IndexUnavailableError } from "../errors.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import { CorpusIndex } from "./corpusIndex.js";
import type { IndexInfo, SearchableCorpus } from "./types.js";

export type CorpusSlot =
  | { status: "ready"; index: SearchableCorpus }
  | { status: "unavailable"; error: IndexUnavailableError };

export type CorpusStatus =
  | ({ corpus: string; status: "ready" } & Omit<IndexInfo, "corpus">)
  | { corpus: string; status: "unavailable"; reason: IndexUnavailableError["reason"]; message: string };

export function artifactPathFor(indexDir: string, corpus: string): string {
  return path.join(indexDir, `${corpus}.sqlite`);
}

/**
 * Holds one published snapshot per corpus. Publishing swaps a reference, so
 * in-flight searches keep the snapshot they started with.
 */
export class CorpusRegistry {
  readonly corpora: readonly string[];
  private readonly indexDir: string;
  private readonly fingerprint: string;
  private readonly logger: Logger;
  private readonly slots = new Map<string, CorpusSlot>();

  constructor(opts: { indexDir: string; corpora: readonly string[]; fingerprint: string; logger?: Logger }) {
    this.indexDir = opts.indexDir;
    this.corpora = [...opts.corpora];
    this.fingerprint = opts.fingerprint;
    this.logger = opts.logger ?? silentLogger;
    for (const corpus of this.corpora) {
      this.slots.set(corpus, {
        status: "unavailable",
        error: new IndexUnavailableError({ corpus, reason: "unbuilt", artifactPath: this.artifactPath(corpus), detail: "not loaded" })
      });
    }
  }

  artifactPath(corpus: string): string {
    return artifactPathFor(this.indexDir, corpus);
  }

  loadAll(): CorpusStatus[] {
    for (const corpus of this.corpora) this.reload(corpus);
    return this.status();
  }

  /** Loads the artifact from disk; on failure the corpus becomes unavailable, it never throws. */
  reload(corpus: string): CorpusSlot {
    let slot: CorpusSlot;
    try {
      const index = CorpusIndex.load({
        corpus,
        artifactPath: this.artifactPath(corpus),
        expectedFingerprint: this.fingerprint
      });
      slot = { status: "ready", index };
      this.logger.info("index.loaded", { corpus, chunks: index.size, fingerprint: index.info.fingerprint });
    } catch (err) {
      const error =
        err instanceof IndexUnavailableError
          ? err
          : new IndexUnavailableError({ corpus, reason: "corrupt", artifactPath: this.artifactPath(corpus), detail: String(err), cause: err });
      slot = { status: "unavailable", error };
      this.logger.warn("index.unavailable", { corpus, reason: error.reason, error: error.message });
    }
    this.slots.set(corpus, slot);
    return slot;
  }

  /** Publishes an already-built snapshot (used after an in-process rebuild). */
  publish(corpus: string, index: SearchableCorpus): void {
    if (!this.corpora.includes(corpus)) throw new Error(`Unknown corpus "${corpus}"`);
    this.slots.set(corpus, { status: "ready", index });
  }

  get(corpus: string): SearchableCorpus {
    const slot = this.slots.get(corpus);
    if (!slot) {
      throw new IndexUnavailableError({ corpus, reason: "missing", detail: "corpus is not configured" });
    }
    if (slot.status === "unavailable") throw slot.error;
    return slot.index;
  }

  tryGet(corpus: string): SearchableCorpus | undefined {
    const slot = this.slots.get(corpus);
    return slot?.status === "ready" ? slot.index : undefined;
  }

  available(): string[] {
    return this.corpora.filter((c) => this.slots.get(c)?.status === "ready");
  }

  status(): CorpusStatus[] {
    return this.corpora.map((corpus): CorpusStatus => {
      const slot = this.slots.get(corpus);
      if (slot?.status === "ready") {
        const { corpus: _c, ...rest } = slot.index.info;
        return { corpus, status: "ready", ...rest };
      }
      const error = slot?.error ?? new IndexUnavailableError({ corpus, reason: "missing" });
      return { corpus, status: "unavailable", reason: error.reason, message: error.message };
    });
  }
}
