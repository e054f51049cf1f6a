import { z } from 'zod';
import { Phase } from './conversation.js';
import { Intent } from './intent.js';

export const ChatInput = z.object({
  message: z.string().min(1).max(2000),
  threadId: z.string().min(1).max(64).optional(),
});
export type ChatInputT = z.infer<typeof ChatInput>;

export const ChatOutput = z.object({
  reply: z.string().min(1),
  threadId: z.string().min(1).max(64),
  phase: Phase,
  intent: Intent,
  bookingReference: z.string().optional(),
  error: z
    .object({
      kind: z.string(),
      message: z.string(),
    })
    .optional(),
});
export type ChatOutputT = z.infer<typeof ChatOutput>;

export const ChatMessage = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});
export type ChatMessageT = z.infer<typeof ChatMessage>;
