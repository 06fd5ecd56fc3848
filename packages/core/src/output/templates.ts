// packages/core/src/output/templates.ts — Top-level memory-bank documents and the manifest rendering

import type { ChangeSet } from '../types/build.js';
import type { ArchitectureManifest } from '../types/manifest.js';
import type { ComponentResult, ValidationReport } from '../types/results.js';

export interface OverviewInput {
  projectName: string;
  manifest: ArchitectureManifest;
  results: readonly ComponentResult[];
  reports: readonly ValidationReport[];
  changes: ChangeSet;
  timestamp: string;
}

function componentLink(id: string): string {
  return `[${id}](components/${id}/projectbrief.md)`;
}

export function renderManifestMarkdown(manifest: ArchitectureManifest): string {
  const lines = [
    '# Architecture Manifest',
    '',
    `- System type: ${manifest.systemType}`,
    `- Generated: ${manifest.generatedAt}`,
    '',
    manifest.summary,
    '',
    '## Components',
  ];
  for (const c of manifest.components) {
    lines.push(
      '',
      `### ${c.name} (\`${c.id}\`)`,
      '',
      `- Kind: ${c.kind}`,
      `- Globs: ${c.globs.map((g) => `\`${g}\``).join(', ') || 'none'}`,
      `- Depends on: ${c.relationships.join(', ') || 'none'}`,
    );
    if (c.description) lines.push('', c.description);
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Render the fixed top-level section set from the manifest and the build
 * outcome. Keys are paths relative to `<output>/memory-bank/`.
 */
export function renderOverview(input: OverviewInput): Record<string, string> {
  const { manifest, results, reports } = input;
  const title = input.projectName || 'Project';
  const failed = results.filter((r) => !r.success);
  const review = reports.filter((r) => r.needsReview);

  const componentRows = manifest.components.map(
    (c) => `| ${componentLink(c.id)} | ${c.kind} | ${c.description.replace(/\|/g, '\\|')} |`,
  );

  const relationships = manifest.components.flatMap((c) => c.relationships.map((r) => `- ${c.id} -> ${r}`));

  const byKind = new Map<string, string[]>();
  for (const c of manifest.components) {
    byKind.set(c.kind, [...(byKind.get(c.kind) ?? []), c.id]);
  }

  const statusLine = (id: string): string => {
    const result = results.find((r) => r.componentId === id);
    const report = reports.find((r) => r.componentId === id);
    if (result && !result.success) return `- ${id}: failed (${result.failure?.kind ?? 'unknown'})`;
    if (report?.needsReview) return `- ${id}: needs review (confidence ${report.confidence.toFixed(2)})`;
    if (report) return `- ${id}: validated (confidence ${report.confidence.toFixed(2)})`;
    return `- ${id}: unchanged`;
  };

  const tasks = [
    ...failed.map((r) => `- [ ] Regenerate ${r.componentId} (${r.failure?.kind ?? 'failed'})`),
    ...review.map((r) => `- [ ] Review ${r.componentId} (confidence ${r.confidence.toFixed(2)})`),
  ];

  return {
    'projectbrief.md': [
      `# ${title}`,
      '',
      manifest.summary,
      '',
      '## Components',
      '',
      '| Component | Kind | Description |',
      '| --- | --- | --- |',
      ...componentRows,
      '',
    ].join('\n'),
    'productContext.md': [
      '# Product Context',
      '',
      manifest.summary,
      '',
      ...manifest.components.map((c) => `- **${c.name}**: ${c.description || 'no description'}`),
      '',
    ].join('\n'),
    'systemPatterns.md': [
      '# System Patterns',
      '',
      `System type: ${manifest.systemType}`,
      '',
      '## Relationships',
      '',
      ...(relationships.length > 0 ? relationships : ['- none']),
      '',
    ].join('\n'),
    'techContext.md': [
      '# Tech Context',
      '',
      ...[...byKind.entries()].map(([kind, ids]) => `- ${kind}: ${ids.join(', ')}`),
      '',
      'See each component for its own technical context.',
      '',
    ].join('\n'),
    'activeContext.md': [
      '# Active Context',
      '',
      `Last build: ${input.timestamp}`,
      '',
      `- Files added: ${input.changes.added.length}`,
      `- Files modified: ${input.changes.modified.length}`,
      `- Files removed: ${input.changes.removed.length}`,
      `- Files unchanged: ${input.changes.unchanged.length}`,
      '',
    ].join('\n'),
    'progress.md': ['# Progress', '', ...manifest.components.map((c) => statusLine(c.id)), ''].join('\n'),
    'tasks/_index.md': ['# Tasks', '', ...(tasks.length > 0 ? tasks : ['No open tasks.']), ''].join('\n'),
  };
}
