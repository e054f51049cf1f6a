import { describe, expect, it } from '@jest/globals';
import { ChatInput, ChatOutput } from '../../../src/schemas/chat.js';

describe('Chat schemas', () => {
  it('validates ChatInput shape', () => {
    expect(ChatInput.safeParse({ message: 'hi', threadId: 't-123' }).success).toBe(true);
    expect(ChatInput.safeParse({ message: 'hi' }).success).toBe(true);
  });

  it('rejects empty message', () => {
    expect(ChatInput.safeParse({ message: '' }).success).toBe(false);
  });

  it('rejects an overlong thread id', () => {
    expect(ChatInput.safeParse({ message: 'hi', threadId: 'x'.repeat(65) }).success).toBe(false);
  });

  it('validates ChatOutput with a booking reference', () => {
    const reply = {
      reply: 'Booked.',
      threadId: 't-1',
      phase: 'BOOKED',
      intent: 'CONFIRM',
      bookingReference: 'BK-1',
    };
    expect(ChatOutput.safeParse(reply).success).toBe(true);
  });

  it('rejects an unknown phase', () => {
    const out = ChatOutput.safeParse({ reply: 'x', threadId: 't', phase: 'PAID', intent: 'SEARCH' });
    expect(out.success).toBe(false);
  });
});
