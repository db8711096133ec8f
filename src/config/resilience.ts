import { CircuitBreakerConfigSchema, type CircuitBreakerConfig } from '../core/circuit-breaker.js';

export const CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = CircuitBreakerConfigSchema.parse({
  failureThreshold: Number(process.env.CIRCUIT_BREAKER_FAILURE_THRESHOLD) || 5,
  successThreshold: Number(process.env.CIRCUIT_BREAKER_SUCCESS_THRESHOLD) || 1,
  resetTimeout: Number(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT) || 30000,
});
