import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { membankConfigSchema, validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('membankConfigSchema', () => {
  it('validates the default config', () => {
    const result = membankConfigSchema.safeParse(DEFAULT_CONFIG);
    expect(result.success).toBe(true);
  });

  it('applies defaults for missing fields', () => {
    const config = validateConfig({});
    expect(config.agents.command).toBe('claude');
    expect(config.agents.maxTurns).toEqual({ architecture: 200, component: 100, validation: 50, fix: 25 });
    expect(config.agents.abortInFlightOnCancel).toBe(false);
    expect(config.components.concurrency).toBe(5);
    expect(config.components.retries).toBe(1);
    expect(config.validation.concurrency).toBe(10);
    expect(config.validation.acceptanceThreshold).toBe(0.7);
    expect(config.validation.fixPolicy).toBe('accept');
    expect(config.incremental.reuseManifest).toBe(true);
    expect(config.jobs.maxConcurrent).toBe(3);
    expect(config.logLevel).toBe('info');
  });

  it('keeps defaults beside partial sections', () => {
    const config = validateConfig({ agents: { maxTurns: { component: 10 } } });
    expect(config.agents.maxTurns.component).toBe(10);
    expect(config.agents.maxTurns.architecture).toBe(200);
  });

  it('rejects validation concurrency not above component concurrency', () => {
    const result = membankConfigSchema.safeParse({
      components: { concurrency: 8 },
      validation: { concurrency: 8 },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['validation', 'concurrency']);
      expect(result.error.issues[0]?.message).toBe(
        'Validation concurrency (8) must exceed component concurrency (8)',
      );
    }
  });

  it('rejects an acceptance threshold outside [0, 1]', () => {
    expect(membankConfigSchema.safeParse({ validation: { acceptanceThreshold: 1.5 } }).success).toBe(false);
  });

  it('rejects an unknown fix policy', () => {
    expect(membankConfigSchema.safeParse({ validation: { fixPolicy: 'ignore' } }).success).toBe(false);
  });
});

describe('validateConfig', () => {
  it('throws ConfigError naming the first bad field', () => {
    try {
      validateConfig({ components: { retries: -1 } });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.field).toBe('components.retries');
        expect(err.message).toMatch(/^Invalid configuration: components\.retries: /);
      }
    }
  });
});
