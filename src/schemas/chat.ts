import { z } from 'zod';

const UserId = z.string().trim().min(1).max(64);

export const ChatInput = z.object({
  userId: UserId,
  message: z.string().min(1).max(10_000),
});
export type ChatInputT = z.infer<typeof ChatInput>;

export const ResetInput = z.object({
  userId: UserId,
});
export type ResetInputT = z.infer<typeof ResetInput>;

export const HistorySearchInput = z.object({
  userId: UserId,
  query: z.string().trim().min(1).max(500),
  limit: z.number().int().min(1).max(30).optional(),
});
export type HistorySearchInputT = z.infer<typeof HistorySearchInput>;

export const ChatOutput = z.object({
  reply: z.string().min(1),
  kind: z.enum(['lookup', 'no_match', 'chat', 'fallback', 'clarify', 'greeting', 'reset', 'history_search']),
  userId: z.string().min(1),
  stores: z
    .array(
      z.object({
        store: z.string(),
        city: z.string(),
        address: z.string().optional(),
        score: z.number(),
        matchKind: z.enum(['exact', 'alias', 'fuzzy']),
      }),
    )
    .optional(),
});
export type ChatOutputT = z.infer<typeof ChatOutput>;
