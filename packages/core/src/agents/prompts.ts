// packages/core/src/agents/prompts.ts

import type {
  AgentRequest,
  ArchitectureRequest,
  ComponentRequest,
  FixRequest,
  ValidationRequest,
} from '../types/agents.js';
import type { ComponentDescriptor } from '../types/manifest.js';
import { MAX_LISTING_ENTRIES } from '../utils/constants.js';
import { MEMORY_BANK_SECTIONS } from '../output/sections.js';

export interface RenderedPrompt {
  system: string;
  user: string;
}

/**
 * Render the prompt pair for an agent request.
 */
export function renderPrompt(request: AgentRequest): RenderedPrompt {
  switch (request.role) {
    case 'architecture':
      return architecturePrompt(request);
    case 'component':
      return componentPrompt(request);
    case 'validation':
      return validationPrompt(request);
    case 'fix':
      return fixPrompt(request);
  }
}

// -- Helpers --

function formatListing(paths: readonly string[]): string {
  const shown = paths.slice(0, MAX_LISTING_ENTRIES);
  const lines = shown.map((p) => `- ${p}`);
  if (paths.length > shown.length) {
    lines.push(`- ... ${paths.length - shown.length} more files`);
  }
  return lines.join('\n');
}

function formatComponent(c: ComponentDescriptor): string {
  const rel = c.relationships.length > 0 ? c.relationships.join(', ') : 'none';
  return [
    `- id: ${c.id}`,
    `  name: ${c.name}`,
    `  kind: ${c.kind}`,
    `  globs: ${c.globs.join(', ')}`,
    `  depends on: ${rel}`,
    `  description: ${c.description}`,
  ].join('\n');
}

function formatSections(): string {
  return MEMORY_BANK_SECTIONS.map((s) => `- ${s.file} (${s.title}): ${s.purpose}`).join('\n');
}

const FILE_FORMAT = [
  'Return every document as a file block, exactly:',
  '<file path="RELATIVE_PATH">',
  '...markdown...',
  '</file>',
].join('\n');

// -- Templates --

function architecturePrompt(req: ArchitectureRequest): RenderedPrompt {
  return {
    system: [
      'You are a software architect documenting an existing repository.',
      'Read the repository with your tools. Do not modify any file.',
    ].join('\n'),
    user: [
      `Analyze the repository${req.projectName ? ` "${req.projectName}"` : ''} and partition it into components.`,
      '',
      'A component is a service, library, frontend or layer. Every file should belong to exactly one',
      'component; the first component whose globs match a path owns it.',
      '',
      '## Repository files',
      formatListing(req.readablePaths),
      '',
      '## Output',
      'Reply with a single ```json fenced block of this shape:',
      '```json',
      '{',
      '  "systemType": "microservices | monolith | modular_monolith | serverless | mixed | unknown",',
      '  "summary": "two or three sentences on what the system is",',
      '  "components": [',
      '    {',
      '      "id": "lowercase-kebab-id",',
      '      "name": "Human name",',
      '      "kind": "service | library | frontend | layer",',
      '      "globs": ["src/api/**"],',
      '      "relationships": ["other-component-id"],',
      '      "description": "what this component does"',
      '    }',
      '  ]',
      '}',
      '```',
    ].join('\n'),
  };
}

function componentPrompt(req: ComponentRequest): RenderedPrompt {
  const sections = MEMORY_BANK_SECTIONS.filter((s) => req.sections.includes(s.file));
  return {
    system: [
      'You are a technical writer building a memory bank for one component of a larger system.',
      'Read the component sources with your tools. Do not modify any file.',
    ].join('\n'),
    user: [
      `## System`,
      req.architectureSummary,
      '',
      '## Component',
      formatComponent(req.component),
      '',
      '## Files owned by this component',
      formatListing(req.readablePaths),
      '',
      '## Documents to write',
      sections.map((s) => `- ${s.file} (${s.title}): ${s.purpose}`).join('\n'),
      '',
      'Ground every statement in the sources. No placeholder text.',
      FILE_FORMAT,
    ].join('\n'),
  };
}

function validationPrompt(req: ValidationRequest): RenderedPrompt {
  const docs = Object.entries(req.documents)
    .map(([path, content]) => `<file path="${path}">\n${content}</file>`)
    .join('\n\n');
  const siblings = req.siblings.length > 0 ? req.siblings.map(formatComponent).join('\n') : '(none)';
  return {
    system: [
      'You review memory-bank documentation against the source it describes.',
      'Read sources with your tools. Do not modify any file.',
    ].join('\n'),
    user: [
      '## Component',
      formatComponent(req.component),
      '',
      '## Other components (read-only context)',
      siblings,
      '',
      '## Expected sections',
      formatSections(),
      '',
      '## Documents',
      docs,
      '',
      'Score accuracy (claims match the code) and consistency (documents agree with each other',
      'and with the other components) from 0 to 1. List each concrete problem as an issue.',
      'Reply with a single ```json fenced block:',
      '```json',
      '{',
      '  "accuracy": 0.9,',
      '  "consistency": 0.8,',
      '  "issues": [',
      '    { "dimension": "accuracy | consistency", "section": "techContext.md", "severity": "high | medium | low", "description": "..." }',
      '  ]',
      '}',
      '```',
    ].join('\n'),
  };
}

function fixPrompt(req: FixRequest): RenderedPrompt {
  return {
    system: [
      'You repair one memory-bank document so that it resolves a reported issue.',
      'Read sources with your tools. Do not modify any repository file.',
    ].join('\n'),
    user: [
      '## Component',
      formatComponent(req.component),
      '',
      `## Issue (${req.issue.dimension}, ${req.issue.severity})`,
      req.issue.description,
      '',
      `## Current ${req.section}`,
      req.currentContent ?? '(missing)',
      '',
      `Rewrite ${req.section} in full. Return exactly one file block for it.`,
      FILE_FORMAT,
    ].join('\n'),
  };
}
