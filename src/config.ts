/**
 * Centralized Configuration Module
 *
 * This module provides a type-safe, validated configuration for the engine.
 * It loads configuration from environment variables, validates it with zod,
 * and checks production requirements.
 *
 * Features:
 * - Type-safe configuration object inferred from the schema
 * - Environment-aware validation (stricter in production)
 * - Clear error messages listing missing and invalid variables
 * - Defaults for every optional value
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.director.mode);
 *
 *   // Throws ConfigValidationError if production requirements are unmet
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';
import { OUTPUT_BEATS } from './core/director/beat-library';

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_ROLES = ['host', 'economist', 'skeptic'];

export const DEFAULT_BEATS = [
  'reveal',
  'check',
  'deepen',
  'twist',
  'continue',
  'lens_shift',
  'feynman',
  'montage',
  'minigame',
  'exit_ticket',
];

export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

/** Room for the fixed sections of the fallback prompt plus an objective */
export const MIN_PROMPT_LENGTH = 500;

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // SQLite database file used when storage.driver is 'sqlite'
  database: z.object({
    path: z.string().min(1).default('dialogue-director.db'),
  }),

  // Where snapshots and timelines live, and where the entry catalog is read from
  storage: z.object({
    driver: z.enum(['memory', 'sqlite']).default('memory'),
    entriesPath: z.string().min(1).default('./data/entries.json'),
  }),

  // Anthropic API configuration
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default(DEFAULT_MODEL),
    maxTokens: z.number().int().positive().default(1024),
    timeoutMs: z.number().int().positive().default(8000),
  }),

  // Director policy
  director: z.object({
    mode: z.enum(['heuristic', 'delegated']).default('heuristic'),
    availableRoles: z.array(z.string().min(1)).min(1).default(DEFAULT_ROLES),
    availableBeats: z.array(z.string().min(1)).min(1).default(DEFAULT_BEATS),
    outputClockThresholdSec: z.number().int().positive().default(90),
    defaultTalkBurstSec: z.number().int().positive().default(20),
    highLoadTalkBurstSec: z.number().int().positive().default(15),
    decisionTimeoutMs: z.number().int().positive().default(8000),
  }),

  // Actor (instruction assembly)
  actor: z.object({
    promptsDir: z.string().min(1).default('./data/prompts'),
    maxPromptLength: z.number().int().min(MIN_PROMPT_LENGTH).default(2000),
  }),

  // Orchestrator output mode
  orchestrator: z.object({
    responseMode: z.enum(['stub', 'generate']).default('stub'),
    generationTimeoutMs: z.number().int().positive().default(15000),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

export type DirectorConfig = Config['director'];
export type ActorConfig = Config['actor'];
export type OrchestratorConfig = Config['orchestrator'];

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns undefined if the input is undefined or empty so the schema
 * default applies.
 */
function parseCommaSeparated(value: string | undefined): string[] | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the variable is unset, and NaN if it is set but not
 * an integer, so that the schema reports it as invalid.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
}

/**
 * Maps schema paths back to the environment variable that feeds them, so
 * validation errors can name the variable the operator has to fix.
 */
const ENV_VAR_NAMES: Record<string, string> = {
  'server.port': 'PORT',
  'server.host': 'HOST',
  'server.nodeEnv': 'NODE_ENV',
  'database.path': 'DATABASE_PATH',
  'storage.driver': 'STORAGE_DRIVER',
  'storage.entriesPath': 'ENTRIES_PATH',
  'anthropic.apiKey': 'ANTHROPIC_API_KEY',
  'anthropic.model': 'ANTHROPIC_MODEL',
  'anthropic.maxTokens': 'ANTHROPIC_MAX_TOKENS',
  'anthropic.timeoutMs': 'LLM_TIMEOUT_MS',
  'director.mode': 'DIRECTOR_MODE',
  'director.availableRoles': 'DIRECTOR_ROLES',
  'director.availableBeats': 'DIRECTOR_BEATS',
  'director.outputClockThresholdSec': 'OUTPUT_CLOCK_THRESHOLD_SEC',
  'director.defaultTalkBurstSec': 'DEFAULT_TALK_BURST_SEC',
  'director.highLoadTalkBurstSec': 'HIGH_LOAD_TALK_BURST_SEC',
  'director.decisionTimeoutMs': 'DIRECTOR_TIMEOUT_MS',
  'actor.promptsDir': 'PROMPTS_DIR',
  'actor.maxPromptLength': 'MAX_PROMPT_LENGTH',
  'orchestrator.responseMode': 'RESPONSE_MODE',
  'orchestrator.generationTimeoutMs': 'GENERATION_TIMEOUT_MS',
};

/**
 * Load configuration from environment variables.
 * This function reads from the given environment and constructs a raw config
 * object; unset variables are left undefined so schema defaults apply.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    storage: {
      driver: env.STORAGE_DRIVER,
      entriesPath: env.ENTRIES_PATH,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
      model: env.ANTHROPIC_MODEL,
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
      timeoutMs: parseIntOrUndefined(env.LLM_TIMEOUT_MS),
    },
    director: {
      mode: env.DIRECTOR_MODE,
      availableRoles: parseCommaSeparated(env.DIRECTOR_ROLES),
      availableBeats: parseCommaSeparated(env.DIRECTOR_BEATS),
      outputClockThresholdSec: parseIntOrUndefined(env.OUTPUT_CLOCK_THRESHOLD_SEC),
      defaultTalkBurstSec: parseIntOrUndefined(env.DEFAULT_TALK_BURST_SEC),
      highLoadTalkBurstSec: parseIntOrUndefined(env.HIGH_LOAD_TALK_BURST_SEC),
      decisionTimeoutMs: parseIntOrUndefined(env.DIRECTOR_TIMEOUT_MS),
    },
    actor: {
      promptsDir: env.PROMPTS_DIR,
      maxPromptLength: parseIntOrUndefined(env.MAX_PROMPT_LENGTH),
    },
    orchestrator: {
      responseMode: env.RESPONSE_MODE,
      generationTimeoutMs: parseIntOrUndefined(env.GENERATION_TIMEOUT_MS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses a configuration from an environment map.
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws {ConfigValidationError} If any variable fails the schema
 *
 * @example
 * ```typescript
 * const cfg = parseConfig({ DIRECTOR_MODE: 'delegated', ANTHROPIC_API_KEY: 'test-secret' });
 * cfg.director.mode; // 'delegated'
 * ```
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(loadFromEnvironment(env));

  if (!result.success) {
    const invalidVars = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return { name: ENV_VAR_NAMES[path] ?? path, reason: issue.message };
    });
    const description = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${description}`, [], invalidVars);
  }

  const parsed = result.data;

  // Cross-field checks the object schema cannot express
  const invalidVars: { name: string; reason: string }[] = [];
  if (parsed.director.highLoadTalkBurstSec > parsed.director.defaultTalkBurstSec) {
    invalidVars.push({
      name: 'HIGH_LOAD_TALK_BURST_SEC',
      reason: 'must not exceed DEFAULT_TALK_BURST_SEC',
    });
  }
  if (!parsed.director.availableBeats.some((beat) => OUTPUT_BEATS.includes(beat))) {
    invalidVars.push({
      name: 'DIRECTOR_BEATS',
      reason: `must include one of ${OUTPUT_BEATS.join(', ')}`,
    });
  }
  if (invalidVars.length > 0) {
    const description = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${description}`, [], invalidVars);
  }

  return parsed;
}

/**
 * Returns true when the configuration will call the LLM provider.
 */
export function requiresLLM(cfg: Config): boolean {
  return cfg.director.mode === 'delegated' || cfg.orchestrator.responseMode === 'generate';
}

/**
 * Validates the configuration and throws detailed errors for production requirements.
 *
 * In production mode, ANTHROPIC_API_KEY is REQUIRED whenever the delegated
 * Director or generated responses are enabled. In development/test mode it is
 * optional; the engine then runs the heuristic Director and stub responses.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 *
 * @example
 * ```typescript
 * try {
 *   validateConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Missing vars:', error.missingVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function validateConfig(cfg: Config = config): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (cfg.server.nodeEnv === 'production') {
    if (requiresLLM(cfg) && !cfg.anthropic.apiKey) {
      missingVars.push('ANTHROPIC_API_KEY');
    }

    if (cfg.storage.driver === 'memory') {
      invalidVars.push({
        name: 'STORAGE_DRIVER',
        reason: 'In-memory storage loses every session on restart. Use STORAGE_DRIVER=sqlite',
      });
    }
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    throw new ConfigValidationError(errorParts.join('\n'), missingVars, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

function loadConfigOrExit(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    console.error('[Config] Invalid configuration:');
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * The validated, type-safe configuration object, parsed once at module load.
 *
 * @example
 * ```typescript
 * import { config } from './config';
 *
 * serve({ fetch: app.fetch, port: config.server.port });
 * ```
 */
export const config: Config = loadConfigOrExit();

export default config;
