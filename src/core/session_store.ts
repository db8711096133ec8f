import type { SessionConfig } from '../config/session.js';
import { createInMemoryStore } from './stores/inmemory.js';

export type Role = 'user' | 'assistant';

export interface ConversationEntry {
  readonly role: Role;
  readonly text: string;
  /** Process-wide monotonic sequence number assigned on append. */
  readonly seq: number;
}

export interface SessionStore {
  getMsgs(id: string, limit?: number): Promise<ConversationEntry[]>;
  appendMsg(id: string, msg: ConversationEntry, limit?: number): Promise<void>;
  search(id: string, predicate: (entry: ConversationEntry) => boolean): Promise<ConversationEntry[]>;
  clear(id: string): Promise<void>;
  close?(): void;
}

export function createStore(cfg: SessionConfig): SessionStore {
  return createInMemoryStore(cfg);
}
