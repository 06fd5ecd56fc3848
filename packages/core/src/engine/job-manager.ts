// packages/core/src/engine/job-manager.ts — In-process build job submission, queueing and status

import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadConfig } from '../config/loader.js';
import type { MembankConfigInput } from '../config/schema.js';
import type { NameStatusReader } from '../changes/git.js';
import type { BuildStore } from '../memory/build-store.js';
import { CliBackend } from '../models/cli-backend.js';
import type { AgentBackend } from '../types/agents.js';
import type {
  BuildJob,
  BuildLogLevel,
  BuildRequest,
  BuildState,
  BuildStatusUpdate,
  BuildSummary,
} from '../types/build.js';
import type { MembankConfig } from '../types/config.js';
import type { CostSnapshot, ProgressSnapshot } from '../types/tracking.js';
import { InvalidRequestError } from '../utils/errors.js';
import { generateBuildId } from '../utils/id.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BuildCoordinator } from './build-coordinator.js';
import { CancellationToken } from './cancellation.js';
import type { EventBus } from './event-bus.js';

export interface JobManagerOptions {
  store: BuildStore;
  /** Defaults to `jobs.maxConcurrent` from the overrides */
  maxConcurrent?: number;
  /** Applied on top of each repository's .membank.yml */
  configOverrides?: MembankConfigInput;
  /** Defaults to the CLI subprocess backend configured per repository */
  createBackend?: (config: MembankConfig) => AgentBackend;
  onStatus?: (update: BuildStatusUpdate) => void;
  events?: EventBus;
  logger?: Logger;
  readNameStatus?: NameStatusReader;
}

interface ActiveJob {
  request: BuildRequest;
  config: MembankConfig;
  token: CancellationToken;
  state: BuildState;
  progress: ProgressSnapshot | null;
  cost: CostSnapshot | null;
  logLines: string[];
  coordinator: BuildCoordinator | null;
}

interface Waiter {
  promise: Promise<BuildJob>;
  resolve: (job: BuildJob) => void;
}

function emptyProgress(): ProgressSnapshot {
  return {
    phase: null,
    phases: {
      architecture: { total: 0, done: 0, failed: 0 },
      components: { total: 0, done: 0, failed: 0 },
      validation: { total: 0, done: 0, failed: 0 },
      merge: { total: 0, done: 0, failed: 0 },
    },
    components: {},
  };
}

function emptyCost(): CostSnapshot {
  return {
    totalCost: 0,
    totalTokens: 0,
    inputTokens: 0,
    outputTokens: 0,
    invocations: 0,
    phaseCosts: { architecture: 0, components: 0, validation: 0, merge: 0 },
    phaseTokens: { architecture: 0, components: 0, validation: 0, merge: 0 },
    componentCosts: {},
    componentTokens: {},
  };
}

/**
 * Accepts build requests, runs at most `maxConcurrent` builds at once and
 * queues the rest in submission order. Every job and its log lines are
 * persisted through the BuildStore.
 */
export class JobManager {
  private store: BuildStore;
  private maxConcurrent: number;
  private logger: Logger;
  private queue: string[] = [];
  private running = new Set<string>();
  private active = new Map<string, ActiveJob>();
  private waiters = new Map<string, Waiter>();

  constructor(private options: JobManagerOptions) {
    this.store = options.store;
    this.maxConcurrent =
      options.maxConcurrent ?? loadConfig({ skipFile: true, overrides: options.configOverrides }).jobs.maxConcurrent;
    this.logger = options.logger ?? createLogger('info', 'jobs');
    const interrupted = this.store.failInterrupted('Interrupted: process restarted');
    if (interrupted > 0) {
      this.logger.warn(`Marked ${interrupted} interrupted job(s) as failed`);
    }
  }

  /**
   * Validate and register a build. Starts it right away when a slot is free,
   * otherwise queues it. Throws InvalidRequestError or ConfigError.
   */
  submit(request: BuildRequest): BuildJob {
    const repoPath = resolve(request.repoPath);
    let isDir = false;
    try {
      isDir = statSync(repoPath).isDirectory();
    } catch {
      throw new InvalidRequestError(`Repository not found: ${repoPath}`, 'repoPath');
    }
    if (!isDir) {
      throw new InvalidRequestError(`Repository is not a directory: ${repoPath}`, 'repoPath');
    }
    if (!request.outputPath) {
      throw new InvalidRequestError('Output path is required', 'outputPath');
    }
    if (request.changeRange && request.mode !== 'incremental') {
      throw new InvalidRequestError('A change range applies to incremental builds only', 'changeRange');
    }

    const config = loadConfig({ projectDir: repoPath, overrides: this.options.configOverrides });
    const normalized: BuildRequest = { ...request, repoPath, outputPath: resolve(request.outputPath) };
    const id = generateBuildId();
    this.store.create({
      id,
      repoPath,
      outputPath: normalized.outputPath,
      mode: request.mode,
      createdAt: Date.now(),
    });
    this.active.set(id, {
      request: normalized,
      config,
      token: new CancellationToken(),
      state: 'pending',
      progress: null,
      cost: null,
      logLines: [],
      coordinator: null,
    });
    this.queue.push(id);
    this.appendLog(id, 'info', `Queued ${request.mode} build of ${repoPath}`);
    this.pump();
    return this.require(id);
  }

  get(id: string): BuildJob | null {
    return this.store.get(id);
  }

  list(options?: Parameters<BuildStore['list']>[0]): BuildJob[] {
    return this.store.list(options);
  }

  /** Cancel by id. Returns false when the job is unknown or already finished. */
  cancel(id: string): boolean {
    const job = this.active.get(id);
    if (!job) return false;
    const queued = this.queue.indexOf(id);
    if (queued !== -1) {
      this.queue.splice(queued, 1);
      this.appendLog(id, 'warn', 'Cancelled before start');
      this.store.finish(id, 'cancelled', { state: 'cancelled' });
      job.state = 'cancelled';
      this.settle(id);
      return true;
    }
    job.token.cancel(`Build ${id} cancelled by request`);
    return true;
  }

  /** Resolves with the job record once it reaches a terminal status. */
  waitFor(id: string): Promise<BuildJob> {
    const job = this.store.get(id);
    if (!job) return Promise.reject(new InvalidRequestError(`Unknown job: ${id}`, 'jobId'));
    if (!this.active.has(id)) return Promise.resolve(job);
    const existing = this.waiters.get(id);
    if (existing) return existing.promise;
    let resolveWaiter: (job: BuildJob) => void = () => {};
    const promise = new Promise<BuildJob>((res) => {
      resolveWaiter = res;
    });
    this.waiters.set(id, { promise, resolve: resolveWaiter });
    return promise;
  }

  /** Cancel everything and wait for running builds to settle. */
  async shutdown(): Promise<void> {
    const ids = [...this.active.keys()];
    for (const id of ids) this.cancel(id);
    await Promise.all(ids.map((id) => this.waitFor(id)));
  }

  private pump(): void {
    while (this.running.size < this.maxConcurrent && this.queue.length > 0) {
      const id = this.queue.shift();
      if (id === undefined) break;
      this.running.add(id);
      void this.execute(id);
    }
  }

  private async execute(id: string): Promise<void> {
    const job = this.active.get(id);
    if (!job) return;
    const backend = this.options.createBackend?.(job.config) ?? new CliBackend(job.config.agents);
    const coordinator = new BuildCoordinator({
      jobId: id,
      request: job.request,
      config: job.config,
      backend,
      token: job.token,
      events: this.options.events,
      logger: createLogger(job.config.logLevel, id),
      readNameStatus: this.options.readNameStatus,
      onLog: (level, message) => this.appendLog(id, level, message),
      onProgress: (progress) => {
        job.progress = progress;
        this.push(id, 'running');
      },
      onCost: (cost) => {
        job.cost = cost;
      },
      onState: (state) => {
        job.state = state;
        this.store.updateState(id, state);
        this.push(id, 'running');
      },
    });
    job.coordinator = coordinator;
    this.store.markRunning(id);
    this.push(id, 'running');

    let summary: BuildSummary | null = null;
    let error: string | null = null;
    try {
      summary = await coordinator.run();
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }

    const state = coordinator.currentState;
    const status = error !== null ? 'failed' : state === 'cancelled' ? 'cancelled' : 'completed';
    this.store.finish(id, status, { state, error, summary });
    job.cost = summary?.cost ?? job.cost;
    this.running.delete(id);
    this.settle(id);
    this.pump();
  }

  private settle(id: string): void {
    const job = this.active.get(id);
    const record = this.require(id);
    if (job) this.emitUpdate(record, job);
    this.active.delete(id);
    const waiter = this.waiters.get(id);
    if (waiter) {
      this.waiters.delete(id);
      waiter.resolve(record);
    }
  }

  private appendLog(id: string, level: BuildLogLevel, message: string): void {
    this.store.appendLog(id, level, message);
    this.active.get(id)?.logLines.push(message);
  }

  private push(id: string, status: BuildStatusUpdate['status']): void {
    const job = this.active.get(id);
    if (!job || !this.options.onStatus) return;
    this.emit({
      jobId: id,
      status,
      state: job.state,
      progress: job.progress ?? emptyProgress(),
      cost: job.cost ?? emptyCost(),
      logLines: [...job.logLines],
    });
  }

  private emitUpdate(record: BuildJob, job: ActiveJob): void {
    this.emit({
      jobId: record.id,
      status: record.status,
      state: record.state,
      progress: job.progress ?? emptyProgress(),
      cost: job.cost ?? emptyCost(),
      logLines: [...job.logLines],
    });
  }

  private emit(update: BuildStatusUpdate): void {
    try {
      this.options.onStatus?.(update);
    } catch (err) {
      this.logger.warn(`Status subscriber threw: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private require(id: string): BuildJob {
    const job = this.store.get(id);
    if (!job) throw new InvalidRequestError(`Unknown job: ${id}`, 'jobId');
    return job;
  }
}
