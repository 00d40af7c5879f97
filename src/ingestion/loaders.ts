import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type { CorpusName } from "../config.js";
import type { ChunkInput } from "../corpus/types.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import { chunkText, normalizeText } from "./chunker.js";
import { discoverFiles } from "./files.js";

export type LoadOptions = {
  sourceDir: string;
  logger?: Logger;
  chunkSizeTokens?: number;
  overlapTokens?: number;
};

export type LoadResult = { chunks: ChunkInput[]; filesRead: number; filesSkipped: number };

export const DOC_EXTS = [".md", ".txt", ".rst"] as const;
export const TICKET_EXTS = [".json", ".txt"] as const;
export const CONFIG_EXTS = [".yaml", ".yml", ".json", ".ini", ".conf", ".cfg"] as const;

const TicketSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    status: z.string().optional(),
    severity: z.string().optional(),
    priority: z.string().optional(),
    assignee: z.string().nullable().optional()
  })
  .passthrough();

export type Ticket = z.infer<typeof TicketSchema>;

export function renderTicket(t: Ticket): string {
  return [
    `Ticket ID: ${t.id ?? ""}`,
    `Status: ${t.status ?? "unknown"}`,
    `Severity: ${t.severity ?? "unknown"}`,
    `Priority: ${t.priority ?? "unknown"}`,
    `Assignee: ${t.assignee ?? "unassigned"}`,
    `Title: ${t.title ?? ""}`,
    `Description: ${t.description ?? ""}`
  ].join("\n");
}

export async function loadDocs(opts: LoadOptions): Promise<LoadResult> {
  const chunkSizeTokens = opts.chunkSizeTokens ?? 160;
  const overlapTokens = opts.overlapTokens ?? 40;
  return await loadEach("docs", opts, DOC_EXTS, async (filePath, content) => {
    const topic = path.basename(filePath, path.extname(filePath));
    return chunkText(content, { chunkSizeTokens, overlapTokens }).map((c) => ({
      text: c.text,
      metadata: { source: "docs", file: filePath, topic, chunk: c.index }
    }));
  });
}

export async function loadTickets(opts: LoadOptions): Promise<LoadResult> {
  return await loadEach("tickets", opts, TICKET_EXTS, async (filePath, content) => {
    if (path.extname(filePath).toLowerCase() !== ".json") {
      return [{ text: normalizeText(content), metadata: { source: "tickets", file: filePath, severity: "unknown" } }];
    }
    const raw: unknown = JSON.parse(content);
    const list = Array.isArray(raw) ? raw : [raw];
    return list.map((entry) => {
      const t = TicketSchema.parse(entry);
      return {
        text: renderTicket(t),
        metadata: {
          source: "tickets",
          file: filePath,
          id: t.id === undefined ? "" : String(t.id),
          status: t.status ?? "unknown",
          severity: t.severity ?? "unknown",
          priority: t.priority ?? "unknown",
          assignee: t.assignee ?? "unassigned"
        }
      };
    });
  });
}

export async function loadConfigs(opts: LoadOptions): Promise<LoadResult> {
  return await loadEach("configs", opts, CONFIG_EXTS, async (filePath, content) => [
    {
      text: content.trim(),
      metadata: {
        source: "configs",
        file: filePath,
        format: path.extname(filePath).slice(1).toLowerCase(),
        name: path.basename(filePath, path.extname(filePath))
      }
    }
  ]);
}

export const corpusLoaders: Record<CorpusName, (opts: LoadOptions) => Promise<LoadResult>> = {
  docs: loadDocs,
  tickets: loadTickets,
  configs: loadConfigs
};

async function loadEach(
  corpus: string,
  opts: LoadOptions,
  exts: readonly string[],
  toChunks: (file: string, content: string) => Promise<ChunkInput[]>
): Promise<LoadResult> {
  const logger = opts.logger ?? silentLogger;
  const files = await discoverFiles({ root: opts.sourceDir, includeExts: exts });
  const result: LoadResult = { chunks: [], filesRead: 0, filesSkipped: 0 };

  for (const file of files) {
    try {
      const content = await fs.readFile(file.path, "utf8");
      if (!content.trim()) {
        result.filesSkipped += 1;
        continue;
      }
      const chunks = (await toChunks(file.relPath, content)).filter((c) => c.text.trim().length > 0);
      result.chunks.push(...chunks);
      result.filesRead += 1;
    } catch (err) {
      result.filesSkipped += 1;
      logger.warn("ingest.file.skipped", { corpus, file: file.path, error: err });
    }
  }

  if (result.chunks.length === 0) {
    throw new Error(`No ${corpus} files found in ${opts.sourceDir} (looked for ${exts.join(", ")})`);
  }
  return result;
}
