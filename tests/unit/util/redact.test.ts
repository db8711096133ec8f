import { describe, it, expect } from '@jest/globals';
import { scrubMessage, scrubPII } from '../../../src/util/redact.js';

describe('scrubMessage', () => {
  it.each([
    ['Authorization: Bearer abc.def-123', 'Authorization: Bearer [REDACTED_TOKEN]'],
    ['key sk-test1234567890', 'key [REDACTED_KEY]'],
    ['mail jane.doe@example.com now', 'mail [REDACTED_EMAIL] now'],
    ['call +1 (555) 123-4567 today', 'call [REDACTED_PHONE] today'],
    ['Acme on 12 Elm Street', 'Acme on 12 Elm Street'],
  ])('%j → %j', (input, expected) => {
    expect(scrubMessage(input, true)).toBe(expected);
  });

  it('leaves text alone when disabled', () => {
    expect(scrubMessage('mail jane.doe@example.com', false)).toBe('mail jane.doe@example.com');
  });
});

describe('scrubPII', () => {
  it('scrubs nested values without touching the input', () => {
    const input = { user: { email: 'jane@example.com' }, list: ['x@example.org'], n: 3 };
    expect(scrubPII(input, true)).toEqual({
      user: { email: '[REDACTED_EMAIL]' },
      list: ['[REDACTED_EMAIL]'],
      n: 3,
    });
    expect(input.user.email).toBe('jane@example.com');
  });

  it('passes errors through unchanged', () => {
    const err = new Error('boom');
    expect(scrubPII(err, true)).toBe(err);
  });

  it('copes with cycles', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.self = node;
    expect(() => scrubPII(node, true)).not.toThrow();
  });

  it('returns the argument itself when disabled', () => {
    const input = { email: 'jane@example.com' };
    expect(scrubPII(input, false)).toBe(input);
  });
});
