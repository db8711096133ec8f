import { z } from 'zod';

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a friendly assistant.',
  'Answer briefly and to the point.',
  'Store and city lookups are handled separately; if the user asks where a store is, suggest starting the message with /find.',
].join('\n');

const LlmConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default('gpt-4.1-mini'),
  maxTokens: z.coerce.number().int().min(1).default(250),
  temperature: z.coerce.number().min(0).max(2).default(0.4),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export function loadLlmConfig(): LlmConfig {
  return LlmConfigSchema.parse({
    baseUrl: process.env.LLM_PROVIDER_BASEURL || undefined,
    apiKey: process.env.LLM_API_KEY || process.env.OPENAI_API_KEY || undefined,
    model: process.env.LLM_MODEL || undefined,
    maxTokens: process.env.LLM_MAX_TOKENS || undefined,
    temperature: process.env.LLM_TEMPERATURE || undefined,
    systemPrompt: process.env.LLM_SYSTEM_PROMPT || undefined,
  });
}
