// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  ARCHITECTURE_MAX_TURNS,
  COMPONENT_MAX_TURNS,
  DEFAULT_ACCEPTANCE_THRESHOLD,
  DEFAULT_AGENT_TIMEOUT_MS,
  DEFAULT_COMPONENT_CONCURRENCY,
  DEFAULT_COMPONENT_RETRIES,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENT_JOBS,
  DEFAULT_MIN_SECTION_CHARS,
  DEFAULT_RETRY_BACKOFF_MS,
  DEFAULT_VALIDATION_CONCURRENCY,
  FIX_MAX_TURNS,
  VALIDATION_MAX_TURNS,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const DEFAULT_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'USER',
  'SHELL',
  'LANG',
  'TERM',
  'TMPDIR',
  'ANTHROPIC_API_KEY',
  'ANTHROPIC_BASE_URL',
];

const turnBudgetsSchema = z.object({
  architecture: z.number().int().positive().default(ARCHITECTURE_MAX_TURNS),
  component: z.number().int().positive().default(COMPONENT_MAX_TURNS),
  validation: z.number().int().positive().default(VALIDATION_MAX_TURNS),
  fix: z.number().int().positive().default(FIX_MAX_TURNS),
});

const agentsConfigSchema = z.object({
  command: z.string().min(1).default('claude'),
  args: z.array(z.string()).default([]),
  model: z.string().min(1).default('claude-sonnet-4-20250514'),
  timeoutMs: z.number().int().positive().default(DEFAULT_AGENT_TIMEOUT_MS),
  idleTimeoutMs: z.number().int().positive().default(DEFAULT_IDLE_TIMEOUT_MS),
  abortInFlightOnCancel: z.boolean().default(false),
  envAllowlist: z.array(z.string()).default(DEFAULT_ENV_ALLOWLIST),
  maxTurns: turnBudgetsSchema.default({}),
});

const componentsConfigSchema = z.object({
  concurrency: z.number().int().positive().max(64).default(DEFAULT_COMPONENT_CONCURRENCY),
  retries: z.number().int().nonnegative().max(5).default(DEFAULT_COMPONENT_RETRIES),
  backoffMs: z.number().int().nonnegative().default(DEFAULT_RETRY_BACKOFF_MS),
});

const validationConfigSchema = z.object({
  concurrency: z.number().int().positive().max(128).default(DEFAULT_VALIDATION_CONCURRENCY),
  acceptanceThreshold: z.number().min(0).max(1).default(DEFAULT_ACCEPTANCE_THRESHOLD),
  minSectionChars: z.number().int().nonnegative().default(DEFAULT_MIN_SECTION_CHARS),
  fixPolicy: z.enum(['accept', 'recheck']).default('accept'),
});

const incrementalConfigSchema = z.object({
  reuseManifest: z.boolean().default(true),
  fallbackOnCorruptIndex: z.boolean().default(true),
});

const jobsConfigSchema = z.object({
  maxConcurrent: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT_JOBS),
});

export const membankConfigSchema = z
  .object({
    configVersion: z.number().int().positive().optional(),
    project: z
      .object({
        name: z.string().default(''),
        description: z.string().default(''),
      })
      .default({}),
    agents: agentsConfigSchema.default({}),
    components: componentsConfigSchema.default({}),
    validation: validationConfigSchema.default({}),
    incremental: incrementalConfigSchema.default({}),
    jobs: jobsConfigSchema.default({}),
    ignore: z.array(z.string()).default([]),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  })
  .superRefine((data, ctx) => {
    if (data.validation.concurrency <= data.components.concurrency) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['validation', 'concurrency'],
        message: `Validation concurrency (${data.validation.concurrency}) must exceed component concurrency (${data.components.concurrency})`,
      });
    }
  });

export type MembankConfigInput = z.input<typeof membankConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof membankConfigSchema> {
  const result = membankConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
