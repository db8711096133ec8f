import type { SessionStore, ConversationEntry } from '../session_store.js';
import type { SessionConfig } from '../../config/session.js';

interface Entry {
  msgs: ConversationEntry[];
  touchedAt: number;
}

export function createInMemoryStore(cfg: SessionConfig): SessionStore {
  const store = new Map<string, Entry>();
  const ttlMs = cfg.idleTtlSec * 1000;

  let sweepInterval: NodeJS.Timeout | undefined;
  if (ttlMs > 0) {
    sweepInterval = setInterval(() => {
      const cutoff = Date.now() - ttlMs;
      for (const [id, entry] of store.entries()) {
        if (entry.touchedAt <= cutoff) {
          store.delete(id);
        }
      }
    }, Math.min(ttlMs, 60_000));
    sweepInterval.unref();
  }

  function getEntry(id: string): Entry {
    let entry = store.get(id);
    if (!entry) {
      entry = { msgs: [], touchedAt: Date.now() };
      store.set(id, entry);
    }
    entry.touchedAt = Date.now();
    return entry;
  }

  return {
    async getMsgs(id: string, limit?: number): Promise<ConversationEntry[]> {
      const entry = getEntry(id);
      if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0) {
        return entry.msgs.slice(-limit);
      }
      return [...entry.msgs];
    },

    async appendMsg(id: string, msg: ConversationEntry, limit?: number): Promise<void> {
      const entry = getEntry(id);
      entry.msgs.push(msg);
      if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0) {
        while (entry.msgs.length > limit) {
          entry.msgs.shift();
        }
      }
    },

    async search(id: string, predicate: (entry: ConversationEntry) => boolean): Promise<ConversationEntry[]> {
      const entry = store.get(id);
      return entry ? entry.msgs.filter(predicate) : [];
    },

    async clear(id: string): Promise<void> {
      store.delete(id);
    },

    close(): void {
      if (sweepInterval) clearInterval(sweepInterval);
    },
  };
}
