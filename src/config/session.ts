import { z } from 'zod';

const SessionConfigSchema = z.object({
  kind: z.enum(['memory']).default('memory'),
  // 0 keeps sessions for the lifetime of the process.
  idleTtlSec: z.coerce.number().int().min(0).default(0),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(): SessionConfig {
  return SessionConfigSchema.parse({
    kind: process.env.SESSION_STORE || 'memory',
    idleTtlSec: process.env.SESSION_IDLE_TTL_SEC || 0,
  });
}
