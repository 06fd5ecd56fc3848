// packages/core/src/utils/errors.ts

import type { AgentFailure } from '../types/agents.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** Phase 1 produced no usable manifest. Fatal to the build. */
export class ArchitectureUnresolvedError extends Error {
  constructor(
    message: string,
    public readonly failure?: AgentFailure,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ArchitectureUnresolvedError';
  }
}

/** The persisted fingerprint index could not be read back. */
export class IndexCorruptError extends Error {
  constructor(
    message: string,
    public readonly location?: string,
  ) {
    super(message);
    this.name = 'IndexCorruptError';
  }
}

/** A manifest violates its invariants (duplicate ids, unsafe ids, shared output paths). */
export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly componentId?: string,
  ) {
    super(message);
    this.name = 'ManifestError';
  }
}

export class BuildStateError extends Error {
  constructor(
    message: string,
    public readonly from?: string,
    public readonly to?: string,
  ) {
    super(message);
    this.name = 'BuildStateError';
  }
}

/** Second write to an output path already claimed in this build. */
export class OutputConflictError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'OutputConflictError';
  }
}

/** A build request that cannot be accepted (missing repository, bad paths). */
export class InvalidRequestError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}
