// packages/core/src/memory/build-store.ts — SQLite persistence for build jobs and their log lines

import type Database from 'better-sqlite3';
import type {
  BuildJob,
  BuildJobStatus,
  BuildLogLevel,
  BuildMode,
  BuildState,
  BuildSummary,
} from '../types/build.js';

export interface BuildLogRecord {
  jobId: string;
  seq: number;
  level: BuildLogLevel;
  message: string;
  createdAt: number;
}

interface JobRow {
  id: string;
  repo_path: string;
  output_path: string;
  mode: BuildMode;
  status: BuildJobStatus;
  state: BuildState;
  error_text: string | null;
  summary_json: string | null;
  created_at: number;
  started_at: number | null;
  finished_at: number | null;
}

interface LogRow {
  job_id: string;
  seq: number;
  level: BuildLogLevel;
  message: string;
  created_at: number;
}

const TERMINAL_STATUSES: readonly BuildJobStatus[] = ['completed', 'failed', 'cancelled'];

export class BuildStore {
  constructor(private db: Database.Database) {}

  /** Insert a new pending job. */
  create(job: Pick<BuildJob, 'id' | 'repoPath' | 'outputPath' | 'mode' | 'createdAt'>): void {
    this.db
      .prepare(
        `INSERT INTO jobs (id, repo_path, output_path, mode, status, state, created_at, updated_at)
         VALUES (?, ?, ?, ?, 'pending', 'pending', ?, ?)`,
      )
      .run(job.id, job.repoPath, job.outputPath, job.mode, job.createdAt, job.createdAt);
  }

  /** Get a job by ID, log lines included. */
  get(id: string): BuildJob | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(id);
    return row ? this.toJob(row) : null;
  }

  markRunning(id: string): void {
    const now = Date.now();
    this.db
      .prepare(
        `UPDATE jobs SET status = 'running', started_at = ?, updated_at = ? WHERE id = ? AND status = 'pending'`,
      )
      .run(now, now, id);
  }

  updateState(id: string, state: BuildState): void {
    this.db
      .prepare('UPDATE jobs SET state = ?, updated_at = ? WHERE id = ?')
      .run(state, Date.now(), id);
  }

  /** Move a job to a terminal status. No-op once the job is already terminal. */
  finish(
    id: string,
    status: Extract<BuildJobStatus, 'completed' | 'failed' | 'cancelled'>,
    details: { state: BuildState; error?: string | null; summary?: BuildSummary | null },
  ): void {
    const now = Date.now();
    this.db
      .prepare(
        `UPDATE jobs SET status = ?, state = ?, error_text = ?, summary_json = ?, finished_at = ?, updated_at = ?
         WHERE id = ? AND status IN ('pending', 'running')`,
      )
      .run(
        status,
        details.state,
        details.error ?? null,
        details.summary ? JSON.stringify(details.summary) : null,
        now,
        now,
        id,
      );
  }

  /** List jobs, newest first. */
  list(options?: { status?: BuildJobStatus; limit?: number }): BuildJob[] {
    const limit = options?.limit ?? 50;
    const rows = options?.status
      ? this.db
          .prepare<[string, number], JobRow>(
            'SELECT * FROM jobs WHERE status = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
          )
          .all(options.status, limit)
      : this.db
          .prepare<[number], JobRow>('SELECT * FROM jobs ORDER BY created_at DESC, rowid DESC LIMIT ?')
          .all(limit);
    return rows.map((r) => this.toJob(r));
  }

  /**
   * Mark jobs left pending or running by a previous process as failed.
   * Returns the number of jobs touched.
   */
  failInterrupted(reason: string): number {
    const now = Date.now();
    const result = this.db
      .prepare(
        `UPDATE jobs SET status = 'failed', state = 'failed', error_text = ?, finished_at = ?, updated_at = ?
         WHERE status IN ('pending', 'running')`,
      )
      .run(reason, now, now);
    return result.changes;
  }

  // ── Job Logs ──

  /** Append a log line. */
  appendLog(jobId: string, level: BuildLogLevel, message: string): void {
    const maxSeq = this.db
      .prepare<[string], { max_seq: number }>(
        'SELECT COALESCE(MAX(seq), 0) AS max_seq FROM job_logs WHERE job_id = ?',
      )
      .get(jobId);

    this.db
      .prepare(
        `INSERT INTO job_logs (job_id, seq, level, message, created_at) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(jobId, (maxSeq?.max_seq ?? 0) + 1, level, message, Date.now());
  }

  /** Get logs for a job in append order. */
  getLogs(jobId: string, fromSeq = 0, limit = 1000): BuildLogRecord[] {
    const rows = this.db
      .prepare<[string, number, number], LogRow>(
        'SELECT * FROM job_logs WHERE job_id = ? AND seq > ? ORDER BY seq ASC LIMIT ?',
      )
      .all(jobId, fromSeq, limit);

    return rows.map((r) => ({
      jobId: r.job_id,
      seq: r.seq,
      level: r.level,
      message: r.message,
      createdAt: r.created_at,
    }));
  }

  static isTerminal(status: BuildJobStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
  }

  private toJob(row: JobRow): BuildJob {
    let summary: BuildSummary | null = null;
    if (row.summary_json) {
      summary = JSON.parse(row.summary_json);
    }
    return {
      id: row.id,
      repoPath: row.repo_path,
      outputPath: row.output_path,
      mode: row.mode,
      status: row.status,
      state: row.state,
      createdAt: row.created_at,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      logLines: this.getLogs(row.id).map((l) => l.message),
      error: row.error_text,
      summary,
    };
  }
}
