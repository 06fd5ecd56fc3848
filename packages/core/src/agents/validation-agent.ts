// packages/core/src/agents/validation-agent.ts — Phase 3: completeness, accuracy and consistency with auto-fix

import { z } from 'zod';
import type { CancellationToken } from '../engine/cancellation.js';
import { addUsage, emptyUsage } from '../models/cost-tracker.js';
import { MEMORY_BANK_SECTIONS, PLACEHOLDER_PATTERNS } from '../output/sections.js';
import type { StagingArea } from '../output/staging.js';
import type { AgentFailureKind, AgentOutcome } from '../types/agents.js';
import type { FixPolicy } from '../types/config.js';
import type { TokenUsage } from '../types/events.js';
import type { ArchitectureManifest, ComponentDescriptor } from '../types/manifest.js';
import type {
  AppliedFix,
  FailureDetail,
  ValidationDimension,
  ValidationIssue,
  ValidationReport,
} from '../types/results.js';
import type { Logger } from '../utils/logger.js';
import { extractJson, normalizeDocumentPath, parseDocuments } from './documents.js';
import type { AgentInvoker } from './invoker.js';

export interface ValidationAgentOptions {
  maxTurns: { validation: number; fix: number };
  minSectionChars: number;
  acceptanceThreshold: number;
  fixPolicy: FixPolicy;
  logger?: Logger;
}

export interface ValidationContext {
  manifest: ArchitectureManifest;
  repoRoot: string;
  ownedPaths: readonly string[];
  staging: StagingArea;
  token?: CancellationToken;
  onUsage?: (usage: TokenUsage) => void;
  onFix?: (fix: AppliedFix) => void;
}

const score = z.number().min(0).max(1);

const checkSchema = z.object({
  accuracy: score,
  consistency: score,
  issues: z
    .array(
      z.object({
        dimension: z.enum(['accuracy', 'consistency', 'completeness']).catch('accuracy'),
        section: z.string().min(1),
        severity: z.enum(['high', 'medium', 'low']).catch('medium'),
        description: z.string().default(''),
      }),
    )
    .default([]),
});

type CheckResult = z.infer<typeof checkSchema>;

type CheckOutcome = { ok: true; check: CheckResult } | { ok: false; failure: FailureDetail<AgentFailureKind> };

/**
 * Local completeness check: every required section present, at least
 * `minChars` characters of content and free of placeholder text.
 */
export function checkCompleteness(
  documents: Readonly<Record<string, string>>,
  minChars: number,
): { score: number; issues: ValidationIssue[] } {
  const issues: ValidationIssue[] = [];
  let passing = 0;
  for (const section of MEMORY_BANK_SECTIONS) {
    const content = documents[section.file];
    let problem: { severity: ValidationIssue['severity']; description: string } | null = null;
    if (content === undefined) {
      problem = { severity: 'high', description: `Section ${section.file} is missing` };
    } else if (content.trim().length < minChars) {
      problem = {
        severity: 'medium',
        description: `Section ${section.file} has ${content.trim().length} characters; at least ${minChars} required`,
      };
    } else if (PLACEHOLDER_PATTERNS.some((p) => p.test(content))) {
      problem = { severity: 'medium', description: `Section ${section.file} contains placeholder text` };
    }
    if (problem) {
      issues.push({
        id: `completeness-${issues.length + 1}`,
        dimension: 'completeness',
        section: section.file,
        ...problem,
      });
    } else {
      passing += 1;
    }
  }
  return { score: passing / MEMORY_BANK_SECTIONS.length, issues };
}

/** Credit fixed issues without another check: score + (1 - score) * fixed / issues. */
export function creditFixes(before: number, issuesInDimension: number, fixedInDimension: number): number {
  if (issuesInDimension === 0) return before;
  return before + (1 - before) * (fixedInDimension / issuesInDimension);
}

export function meanConfidence(scores: Record<ValidationDimension, number>): number {
  return (scores.completeness + scores.accuracy + scores.consistency) / 3;
}

export class ValidationAgent {
  constructor(
    private invoker: AgentInvoker,
    private options: ValidationAgentOptions,
  ) {}

  async validate(component: ComponentDescriptor, ctx: ValidationContext): Promise<ValidationReport> {
    const start = Date.now();
    let usage = emptyUsage();
    const track = <T extends AgentOutcome>(outcome: T): T => {
      usage = addUsage(usage, outcome.usage);
      ctx.onUsage?.(outcome.usage);
      return outcome;
    };

    const documents = await ctx.staging.readAll(component.id);
    const completeness = checkCompleteness(documents, this.options.minSectionChars);

    const first = await this.check(component, ctx, documents, track);
    if (!first.ok) {
      this.options.logger?.warn(`Validator for "${component.id}" failed: ${first.failure.message}`);
      return {
        componentId: component.id,
        scores: { completeness: 0, accuracy: 0, consistency: 0 },
        issues: completeness.issues,
        fixes: [],
        confidence: 0,
        needsReview: true,
        failure: first.failure,
        elapsedMs: Date.now() - start,
        usage,
      };
    }

    const agentIssues: ValidationIssue[] = first.check.issues.map((issue, i) => ({
      id: `${issue.dimension}-${i + 1}`,
      ...issue,
    }));
    const issues = [...completeness.issues, ...agentIssues];

    const fixes: AppliedFix[] = [];
    for (const issue of issues) {
      const fix = await this.fix(component, issue, ctx, documents, track);
      fixes.push(fix);
      ctx.onFix?.(fix);
    }

    const fixedIds = new Set(fixes.filter((f) => f.applied).map((f) => f.issueId));
    const after = checkCompleteness(documents, this.options.minSectionChars);
    let accuracy = first.check.accuracy;
    let consistency = first.check.consistency;

    if (fixedIds.size > 0 && this.options.fixPolicy === 'recheck') {
      const second = await this.check(component, ctx, documents, track);
      if (second.ok) {
        accuracy = second.check.accuracy;
        consistency = second.check.consistency;
      }
    } else {
      const tally = (dimension: ValidationDimension): [number, number] => {
        const inDim = agentIssues.filter((i) => i.dimension === dimension);
        return [inDim.length, inDim.filter((i) => fixedIds.has(i.id)).length];
      };
      accuracy = creditFixes(accuracy, ...tally('accuracy'));
      consistency = creditFixes(consistency, ...tally('consistency'));
    }

    const scores = { completeness: after.score, accuracy, consistency };
    const confidence = meanConfidence(scores);
    return {
      componentId: component.id,
      scores,
      issues,
      fixes,
      confidence,
      needsReview: confidence < this.options.acceptanceThreshold,
      failure: null,
      elapsedMs: Date.now() - start,
      usage,
    };
  }

  private async check(
    component: ComponentDescriptor,
    ctx: ValidationContext,
    documents: Record<string, string>,
    track: <T extends AgentOutcome>(outcome: T) => T,
  ): Promise<CheckOutcome> {
    const outcome = track(
      await this.invoker.invoke(
        {
          role: 'validation',
          label: component.id,
          cwd: ctx.repoRoot,
          readablePaths: [...ctx.ownedPaths],
          maxTurns: this.options.maxTurns.validation,
          component,
          documents: { ...documents },
          siblings: ctx.manifest.components.filter((c) => c.id !== component.id),
        },
        { token: ctx.token },
      ),
    );
    if (!outcome.ok) {
      return { ok: false, failure: { kind: outcome.kind, message: outcome.message } };
    }
    const parsed = checkSchema.safeParse(extractJson(outcome.text));
    if (!parsed.success) {
      return { ok: false, failure: { kind: 'InvalidOutput', message: 'Validation output did not match the expected JSON' } };
    }
    return { ok: true, check: parsed.data };
  }

  /** At most one fix invocation per issue; the result is written back to staging. */
  private async fix(
    component: ComponentDescriptor,
    issue: ValidationIssue,
    ctx: ValidationContext,
    documents: Record<string, string>,
    track: <T extends AgentOutcome>(outcome: T) => T,
  ): Promise<AppliedFix> {
    const section = normalizeDocumentPath(issue.section);
    if (section === null) {
      return {
        issueId: issue.id,
        section: issue.section,
        applied: false,
        fingerprint: null,
        failure: { kind: 'InvalidOutput', message: `Unsafe section path "${issue.section}"` },
      };
    }
    if (ctx.token?.isCancelled) {
      return {
        issueId: issue.id,
        section,
        applied: false,
        fingerprint: null,
        failure: { kind: 'Cancelled', message: 'Build cancelled' },
      };
    }

    const outcome = track(
      await this.invoker.invoke(
        {
          role: 'fix',
          label: `${component.id}/${section}`,
          cwd: ctx.repoRoot,
          readablePaths: [...ctx.ownedPaths],
          maxTurns: this.options.maxTurns.fix,
          component,
          section,
          issue,
          currentContent: documents[section] ?? null,
        },
        { token: ctx.token },
      ),
    );
    if (!outcome.ok) {
      return {
        issueId: issue.id,
        section,
        applied: false,
        fingerprint: null,
        failure: { kind: outcome.kind, message: outcome.message },
      };
    }

    const { documents: returned } = parseDocuments(outcome.text);
    const doc = returned.find((d) => d.path === section) ?? (returned.length === 1 ? returned[0] : undefined);
    if (!doc) {
      return {
        issueId: issue.id,
        section,
        applied: false,
        fingerprint: null,
        failure: { kind: 'InvalidOutput', message: `Fix returned no document for ${section}` },
      };
    }
    const fingerprint = await ctx.staging.replace(component.id, section, doc.content);
    documents[section] = doc.content;
    return { issueId: issue.id, section, applied: true, fingerprint, failure: null };
  }
}
