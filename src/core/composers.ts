import type { MatchResult } from './resolver.js';
import type { ConversationEntry } from './session_store.js';

export const FALLBACK_REPLY = "I couldn't process that right now";
export const CLARIFY_REPLY = "I didn't catch that. Please send a question, or /find followed by a store or city name.";
export const GREETING_REPLY =
  "Hi! I'm an AI assistant. Ask me anything, or look up a store with /find <store or city>.\n" +
  'Commands: /reset clears the conversation, /search <text> looks through it.';
export const RESET_REPLY = 'Context cleared.';
export const SEARCH_USAGE_REPLY = 'Tell me what to look for. Example: /search delivery';

export function composeStoreLine({ record }: MatchResult): string {
  const place = [record.city, record.address].filter(Boolean).join(', ');
  return `• ${record.storeName} — ${place}`;
}

export function composeLookupReply(matches: MatchResult[], maxResults: number): string {
  const shown = matches.slice(0, Math.max(1, maxResults));
  const heading = matches.length === 1 ? 'Found 1 store:' : `Found ${matches.length} stores:`;
  const lines = [heading, ...shown.map(composeStoreLine)];
  if (matches.length > shown.length) {
    lines.push(`…and ${matches.length - shown.length} more. Add a city to narrow it down.`);
  }
  return lines.join('\n');
}

export function composeNoMatchReply(query: string): string {
  const shown = query.trim();
  return shown ? `No stores found for "${shown}".` : 'No stores found.';
}

export function composeTooLongReply(maxLength: number): string {
  return `That message is too long. Please keep it under ${maxLength} characters.`;
}

export function composeHistorySearchReply(query: string, hits: ConversationEntry[]): string {
  if (hits.length === 0) return `Nothing found for "${query.trim()}".`;
  return hits.map((entry) => entry.text).join('\n\n');
}
