import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { BookingAgent } from '../core/agent.js';
import type { TurnResult } from '../core/workflow.js';
import { ChatInput, ChatOutput, type ChatOutputT } from '../schemas/chat.js';
import type { Logger } from '../util/logging.js';

const ThreadParam = z.object({ threadId: z.string().min(1).max(64) });

function toChatOutput(result: TurnResult): ChatOutputT {
  return ChatOutput.parse({
    reply: result.reply,
    threadId: result.conversationId,
    phase: result.phase,
    intent: result.intent,
    ...(result.booking && { bookingReference: result.booking.bookingReference }),
    ...(result.error && { error: { kind: result.error.kind, message: result.error.message } }),
  });
}

export const router = (agent: BookingAgent, log: Logger): Router => {
  const r = express.Router();

  r.post('/chat', async (req, res) => {
    const parsed = ChatInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const result = await agent.chat(parsed.data.message, parsed.data.threadId);
      return res.json(toChatOutput(result));
    } catch (err: unknown) {
      log.error({ err }, 'chat failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.delete('/chat/:threadId', async (req, res) => {
    const parsed = ThreadParam.safeParse(req.params);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const out = await agent.abandon(parsed.data.threadId);
      return res.json({
        threadId: out.conversationId,
        abandoned: out.phase !== undefined,
        ...(out.booking && { bookingReference: out.booking.bookingReference }),
        bookingUnresolved: out.bookingUnresolved,
      });
    } catch (err: unknown) {
      log.error({ err }, 'abandon failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.get('/healthz', (_req, res) => res.json({ ok: true }));

  return r;
};
