// packages/core/src/agents/component-agent.ts — Phase 2: one component's memory-bank subtree

import type { CancellationToken } from '../engine/cancellation.js';
import type { StagingArea } from '../output/staging.js';
import { SECTION_FILES } from '../output/sections.js';
import type { AgentProgress } from '../types/agents.js';
import type { TokenUsage } from '../types/events.js';
import type { ArchitectureManifest, ComponentDescriptor } from '../types/manifest.js';
import type { FailureDetail } from '../types/results.js';
import { OutputConflictError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { parseDocuments } from './documents.js';
import type { AgentInvoker } from './invoker.js';

export interface ComponentContext {
  manifest: ArchitectureManifest;
  /** Repository paths owned by the component */
  ownedPaths: readonly string[];
  repoRoot: string;
  staging: StagingArea;
  token?: CancellationToken;
  onProgress?: (progress: AgentProgress) => void;
}

export type ComponentAttempt =
  | { ok: true; files: string[]; fingerprints: Record<string, string>; usage: TokenUsage }
  | { ok: false; failure: FailureDetail; usage: TokenUsage };

/** Strip output-layout prefixes an agent may echo back. */
function componentRelative(path: string, componentId: string): string {
  for (const prefix of [`memory-bank/components/${componentId}/`, `components/${componentId}/`]) {
    if (path.startsWith(prefix)) return path.slice(prefix.length);
  }
  return path;
}

export class ComponentAgent {
  constructor(
    private invoker: AgentInvoker,
    private options: { maxTurns: number; logger?: Logger },
  ) {}

  /**
   * One attempt: invoke, parse the returned documents and stage them.
   * Failures come back as values.
   */
  async generate(component: ComponentDescriptor, ctx: ComponentContext): Promise<ComponentAttempt> {
    const outcome = await this.invoker.invoke(
      {
        role: 'component',
        label: component.id,
        cwd: ctx.repoRoot,
        readablePaths: [...ctx.ownedPaths],
        maxTurns: this.options.maxTurns,
        component,
        architectureSummary: ctx.manifest.summary,
        sections: SECTION_FILES,
      },
      { token: ctx.token, onProgress: ctx.onProgress },
    );
    if (!outcome.ok) {
      return { ok: false, failure: { kind: outcome.kind, message: outcome.message }, usage: outcome.usage };
    }

    const { documents, rejected } = parseDocuments(outcome.text);
    for (const path of rejected) {
      this.options.logger?.warn(`${component.id}: ignored document with unsafe path "${path}"`);
    }
    if (documents.length === 0) {
      return {
        ok: false,
        failure: { kind: 'InvalidOutput', message: 'No documents in agent output' },
        usage: outcome.usage,
      };
    }

    const fingerprints: Record<string, string> = {};
    try {
      for (const doc of documents) {
        const path = componentRelative(doc.path, component.id);
        fingerprints[path] = await ctx.staging.write(component.id, path, doc.content);
      }
    } catch (err) {
      if (err instanceof OutputConflictError) {
        return { ok: false, failure: { kind: 'OutputConflict', message: err.message }, usage: outcome.usage };
      }
      throw err;
    }

    return { ok: true, files: Object.keys(fingerprints).sort(), fingerprints, usage: outcome.usage };
  }
}
