/**
 * Per-user rolling conversation history.
 *
 * Every operation for one user id runs through that user's own single-slot
 * limiter, so appends and resets for the same user apply in submission order
 * while different users never wait on each other. A limiter lives only while
 * it has work pending for its user.
 */

import Bottleneck from 'bottleneck';
import type { ConversationEntry, Role, SessionStore } from './session_store.js';
import { normalize } from './normalize.js';

export interface NewEntry {
  role: Role;
  text: string;
}

export interface ContextManagerOptions {
  maxHistory: number;
}

interface UserLock {
  limiter: Bottleneck;
  pending: number;
}

export class ConversationContextManager {
  private readonly locks = new Map<string, UserLock>();
  private seq = 0;

  constructor(
    private readonly store: SessionStore,
    private readonly options: ContextManagerOptions,
  ) {}

  get maxHistory(): number {
    return this.options.maxHistory;
  }

  /** Users with an operation queued or running. */
  get activeLocks(): number {
    return this.locks.size;
  }

  async append(userId: string, entry: NewEntry): Promise<void> {
    await this.exclusive(userId, () => this.write(userId, entry));
  }

  /**
   * Commits a user turn and the assistant reply to it as one operation, so no
   * other write for the same user can land between them.
   */
  async appendExchange(userId: string, userText: string, assistantText: string): Promise<void> {
    await this.exclusive(userId, async () => {
      await this.write(userId, { role: 'user', text: userText });
      await this.write(userId, { role: 'assistant', text: assistantText });
    });
  }

  async snapshot(userId: string): Promise<readonly ConversationEntry[]> {
    const entries = await this.exclusive(userId, () => this.store.getMsgs(userId));
    return Object.freeze(entries);
  }

  async reset(userId: string): Promise<void> {
    await this.exclusive(userId, () => this.store.clear(userId));
  }

  /** Entries whose text contains `query` (normalized), newest first. */
  async search(userId: string, query: string, limit = 5): Promise<ConversationEntry[]> {
    const needle = normalize(query);
    if (!needle) return [];
    const hits = await this.exclusive(userId, () =>
      this.store.search(userId, (entry) => normalize(entry.text).includes(needle)),
    );
    return hits.reverse().slice(0, Math.max(1, limit));
  }

  private async write(userId: string, entry: NewEntry): Promise<void> {
    this.seq += 1;
    const stamped: ConversationEntry = Object.freeze({ role: entry.role, text: entry.text, seq: this.seq });
    await this.store.appendMsg(userId, stamped, this.options.maxHistory);
  }

  private async exclusive<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(userId);
    if (!lock) {
      lock = { limiter: new Bottleneck({ maxConcurrent: 1 }), pending: 0 };
      this.locks.set(userId, lock);
    }
    lock.pending += 1;
    try {
      return await lock.limiter.schedule(fn);
    } finally {
      lock.pending -= 1;
      if (lock.pending === 0 && this.locks.get(userId) === lock) {
        this.locks.delete(userId);
      }
    }
  }
}
