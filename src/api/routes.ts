import type { Router } from 'express';
import express from 'express';
import type pino from 'pino';
import type { Assistant } from '../bootstrap.js';
import type { RouteReply } from '../core/router.js';
import { ChatInput, ChatOutput, HistorySearchInput, ResetInput, type ChatOutputT } from '../schemas/chat.js';

function toOutput(userId: string, reply: RouteReply): ChatOutputT {
  return ChatOutput.parse({
    reply: reply.text,
    kind: reply.kind,
    userId,
    stores: reply.matches?.map(({ record, score, matchKind }) => ({
      store: record.storeName,
      city: record.city,
      address: record.address,
      score,
      matchKind,
    })),
  });
}

export const router = (assistant: Assistant, log: pino.Logger): Router => {
  const r = express.Router();

  r.post('/chat', async (req, res) => {
    const parsed = ChatInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const t0 = Date.now();
      const reply = await assistant.router.route(parsed.data.userId, parsed.data.message);
      log.debug({ kind: reply.kind, ms: Date.now() - t0 }, 'chat_routed');
      return res.json(toOutput(parsed.data.userId, reply));
    } catch (err: unknown) {
      log.error({ err }, 'chat failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.post('/reset', async (req, res) => {
    const parsed = ResetInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      await assistant.contextManager.reset(parsed.data.userId);
      return res.json({ ok: true });
    } catch (err: unknown) {
      log.error({ err }, 'reset failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.post('/history/search', async (req, res) => {
    const parsed = HistorySearchInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const { userId, query, limit } = parsed.data;
      const hits = await assistant.contextManager.search(userId, query, limit);
      return res.json({ hits: hits.map(({ role, text, seq }) => ({ role, text, seq })) });
    } catch (err: unknown) {
      log.error({ err }, 'history search failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  return r;
};
