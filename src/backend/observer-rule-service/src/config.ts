/**
 * Observer Rule Service Configuration
 *
 * Settings come from the environment and are checked with zod at startup;
 * anything unset falls back to DEFAULT_ENGINE_CONFIG.
 */

import { z } from 'zod';
import { LogLevelSchema, type LogLevel } from '@mapwatch/shared';

/**
 * How concurrent state writes for one observer are guarded
 * - refresh: re-read before writing; the last commit wins
 * - version: reject the write if the stored version moved since the call started
 */
export const StateLocking = {
  REFRESH: 'refresh',
  VERSION: 'version',
} as const;

export type StateLocking = (typeof StateLocking)[keyof typeof StateLocking];

export const StateLockingSchema = z.enum(['refresh', 'version']);

export interface EngineConfig {
  serviceName: string;
  logLevel: LogLevel;
  stateLocking: StateLocking;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  serviceName: 'observer-rule-service',
  logLevel: 'info',
  stateLocking: StateLocking.REFRESH,
};

const EngineEnvSchema = z.object({
  MAPWATCH_SERVICE_NAME: z.string().min(1).optional(),
  MAPWATCH_LOG_LEVEL: LogLevelSchema.optional(),
  MAPWATCH_STATE_LOCKING: StateLockingSchema.optional(),
});

/**
 * Reads engine settings from environment variables
 *
 * @throws ZodError when a variable is set to an unsupported value
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineEnvSchema.parse({
    MAPWATCH_SERVICE_NAME: env.MAPWATCH_SERVICE_NAME || undefined,
    MAPWATCH_LOG_LEVEL: env.MAPWATCH_LOG_LEVEL || undefined,
    MAPWATCH_STATE_LOCKING: env.MAPWATCH_STATE_LOCKING || undefined,
  });

  return {
    serviceName: parsed.MAPWATCH_SERVICE_NAME ?? DEFAULT_ENGINE_CONFIG.serviceName,
    logLevel: parsed.MAPWATCH_LOG_LEVEL ?? DEFAULT_ENGINE_CONFIG.logLevel,
    stateLocking: parsed.MAPWATCH_STATE_LOCKING ?? DEFAULT_ENGINE_CONFIG.stateLocking,
  };
}
