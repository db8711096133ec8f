import { z } from 'zod';

// Phrases, not single words: "find" or "store" alone shows up in ordinary chat.
export const DEFAULT_LOOKUP_KEYWORDS = [
  'where is',
  'where are',
  'where can i find',
  'find a store',
  'find the store',
  'store in',
  'stores in',
  'store near',
  'stores near',
  'shop in',
  'shops in',
  'nearest store',
  'nearest shop',
  'nearest branch',
];

export const DEFAULT_LOOKUP_COMMANDS = ['/find', '/store'];

// Comma-separated in the environment, a plain list when given in code.
const list = (fallback: string[]) =>
  z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((raw) => {
      const parts = Array.isArray(raw) ? raw : (raw ?? '').split(',');
      const items = parts.map((item) => item.trim().toLowerCase()).filter(Boolean);
      return items.length > 0 ? items : fallback;
    });

const AssistantConfigSchema = z.object({
  catalogPath: z.string().min(1).default('data/stores.json'),
  fuzzyThreshold: z.coerce.number().min(0).max(1).default(0.75),
  minMatchesBeforeFuzzy: z.coerce.number().int().min(0).default(1),
  maxResults: z.coerce.number().int().min(1).default(5),
  maxHistory: z.coerce.number().int().min(1).default(30),
  contextWindow: z.coerce.number().int().min(0).default(10),
  llmTimeoutMs: z.coerce.number().int().min(100).default(5000),
  maxMessageLength: z.coerce.number().int().min(1).default(2000),
  lookupKeywords: list(DEFAULT_LOOKUP_KEYWORDS),
  lookupCommands: list(DEFAULT_LOOKUP_COMMANDS),
});

export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;

/** Raw values straight from the environment or a test; coerced by the schema. */
export type AssistantConfigInput = Partial<Record<keyof AssistantConfig, unknown>>;

export function parseAssistantConfig(input: AssistantConfigInput = {}): AssistantConfig {
  return AssistantConfigSchema.parse(input);
}

export function loadAssistantConfig(): AssistantConfig {
  return parseAssistantConfig({
    catalogPath: process.env.CATALOG_PATH || undefined,
    fuzzyThreshold: process.env.FUZZY_THRESHOLD || undefined,
    minMatchesBeforeFuzzy: process.env.FUZZY_MIN_MATCHES || undefined,
    maxResults: process.env.LOOKUP_MAX_RESULTS || undefined,
    maxHistory: process.env.SESSION_MAX_MESSAGES || undefined,
    contextWindow: process.env.LLM_CONTEXT_WINDOW || undefined,
    llmTimeoutMs: process.env.LLM_TIMEOUT_MS || undefined,
    maxMessageLength: process.env.MAX_MESSAGE_LENGTH || undefined,
    lookupKeywords: process.env.LOOKUP_KEYWORDS,
    lookupCommands: process.env.LOOKUP_COMMANDS,
  });
}
