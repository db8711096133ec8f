import { describe, it, expect } from '@jest/globals';
import { createAssistant } from '../src/bootstrap.js';
import { parseAssistantConfig } from '../src/config/assistant.js';
import { CatalogLoadError } from '../src/core/errors.js';
import { createLogger } from '../src/util/logging.js';

const log = createLogger({ level: 'silent' });

describe('createAssistant', () => {
  it('refuses to start without a readable catalog', async () => {
    await expect(
      createAssistant({ config: parseAssistantConfig({ catalogPath: 'tests/fixtures/missing.json' }), log }),
    ).rejects.toBeInstanceOf(CatalogLoadError);
  });

  it('loads the bundled sample catalog', async () => {
    const assistant = await createAssistant({ config: parseAssistantConfig(), log });
    expect(assistant.catalog.size).toBe(14);
    assistant.close();
  });

  it('falls back when no LLM key is configured', async () => {
    const assistant = await createAssistant({ config: parseAssistantConfig(), log });
    const reply = await assistant.router.route('u1', 'How are you today?');
    expect(reply.kind).toBe('fallback');
    expect(await assistant.contextManager.snapshot('u1')).toEqual([]);
    assistant.close();
  });
});
