import fs from "node:fs/promises";
import { z } from "zod";

import { errorKind } from "../errors.js";
import { discoverFiles } from "../ingestion/files.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import type { ChatMemoryStore } from "./chatMemoryStore.js";

const ConversationSchema = z.object({
  user_id: z.string().min(1).max(50).default("unknown"),
  session_id: z.string().min(1).default("seed"),
  timestamp: z.string().optional(),
  messages: z
    .array(z.object({ role: z.string(), message: z.string() }))
    .default([])
});

export type SeedStats = { files: number; turnsStored: number; turnsSkipped: number; filesFailed: number };

/**
 * Imports conversation files `{user_id, session_id, timestamp, messages:[{role, message}]}`
 * into chat memory. Messages keep their order by spacing timestamps one millisecond apart.
 */
export async function seedChatMemory(store: ChatMemoryStore, dir: string, logger: Logger = silentLogger): Promise<SeedStats> {
  const files = await discoverFiles({ root: dir, includeExts: [".json"] });
  const stats: SeedStats = { files: files.length, turnsStored: 0, turnsSkipped: 0, filesFailed: 0 };

  for (const { path: filePath } of files) {
    let convo: z.infer<typeof ConversationSchema>;
    try {
      convo = ConversationSchema.parse(JSON.parse(await fs.readFile(filePath, "utf8")));
    } catch (err) {
      stats.filesFailed += 1;
      logger.warn("memory.seed.file_failed", { file: filePath, error: err });
      continue;
    }

    const parsedStart = convo.timestamp ? Date.parse(convo.timestamp) : Number.NaN;
    const start = Number.isFinite(parsedStart) ? parsedStart : Date.now();

    for (const [i, msg] of convo.messages.entries()) {
      if ((msg.role !== "user" && msg.role !== "assistant") || !msg.message.trim()) {
        stats.turnsSkipped += 1;
        continue;
      }
      try {
        await store.append({
          userId: convo.user_id,
          sessionId: convo.session_id,
          role: msg.role,
          text: msg.message,
          timestamp: new Date(start + i)
        });
        stats.turnsStored += 1;
      } catch (err) {
        stats.turnsSkipped += 1;
        logger.warn("memory.seed.turn_failed", { file: filePath, index: i, errorKind: errorKind(err), error: err });
      }
    }
  }

  return stats;
}
