// packages/core/src/agents/architecture-agent.ts — Phase 1: partition the repository into components

import type { CancellationToken } from '../engine/cancellation.js';
import type { RepoSnapshot } from '../types/build.js';
import type { TokenUsage } from '../types/events.js';
import type { ArchitectureManifest } from '../types/manifest.js';
import { ArchitectureUnresolvedError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { extractJson } from './documents.js';
import type { AgentInvoker } from './invoker.js';
import { validateManifest, withImplicitRoot } from './manifest.js';

export interface ArchitectureProposal {
  manifest: ArchitectureManifest;
  usage: TokenUsage;
}

export class ArchitectureAgent {
  constructor(
    private invoker: AgentInvoker,
    private options: { projectName: string; maxTurns: number; logger?: Logger },
  ) {}

  /**
   * One invocation over the full repository listing. Throws
   * ArchitectureUnresolvedError when the call fails, its output does not
   * parse or the proposal breaks manifest invariants.
   */
  async propose(
    snapshot: RepoSnapshot,
    ctx?: { token?: CancellationToken; onUsage?: (usage: TokenUsage) => void },
  ): Promise<ArchitectureProposal> {
    const paths = [...snapshot.files.keys()];
    const outcome = await this.invoker.invoke(
      {
        role: 'architecture',
        label: 'architecture',
        cwd: snapshot.root,
        readablePaths: paths,
        maxTurns: this.options.maxTurns,
        projectName: this.options.projectName,
      },
      { token: ctx?.token },
    );
    ctx?.onUsage?.(outcome.usage);

    if (!outcome.ok) {
      throw new ArchitectureUnresolvedError(
        `Architecture analysis failed (${outcome.kind}): ${outcome.message}`,
        outcome,
      );
    }

    const raw = extractJson(outcome.text);
    if (raw === undefined) {
      throw new ArchitectureUnresolvedError('Architecture analysis returned no parsable manifest');
    }

    let manifest: ArchitectureManifest;
    try {
      manifest = validateManifest(raw, this.options.logger);
    } catch (err) {
      throw new ArchitectureUnresolvedError(
        `Architecture manifest rejected: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        { cause: err },
      );
    }

    const complete = withImplicitRoot(manifest, paths);
    this.options.logger?.info(
      `Architecture resolved: ${complete.systemType}, ${complete.components.length} component(s)`,
    );
    return { manifest: complete, usage: outcome.usage };
  }
}
