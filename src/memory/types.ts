import { z } from "zod";

export const ChatRoleSchema = z.enum(["user", "assistant"]);
export type ChatRole = z.infer<typeof ChatRoleSchema>;

export const NewChatTurnSchema = z.object({
  turnId: z.string().min(1).optional(),
  userId: z.string().trim().min(1).max(50),
  sessionId: z.string().min(1),
  role: ChatRoleSchema,
  text: z.string().trim().min(1, "text cannot be empty"),
  timestamp: z.date().optional()
});

export type NewChatTurn = z.input<typeof NewChatTurnSchema>;

export type ChatTurn = {
  turnId: string;
  userId: string;
  sessionId: string;
  role: ChatRole;
  text: string;
  embedding: Float32Array;
  timestamp: Date;
};

export type ScoredTurn = { turn: ChatTurn; score: number };

export type PrunePolicy = {
  /** Restrict to one user; otherwise every user is pruned independently. */
  userId?: string;
  /** Keep at most this many most-recent turns per user. */
  maxTurns?: number;
  /** Delete turns older than this. */
  maxAgeMs?: number;
  now?: Date;
};

export type MemorySearchOptions = {
  /** Only consider the user's N most recent turns (0 or undefined = all). */
  limitTurns?: number;
  minScore?: number;
};
