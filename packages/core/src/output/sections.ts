// packages/core/src/output/sections.ts — The fixed memory-bank section set

export interface SectionSpec {
  /** Path relative to a memory-bank (sub)tree */
  file: string;
  title: string;
  purpose: string;
}

export const MEMORY_BANK_SECTIONS: readonly SectionSpec[] = [
  {
    file: 'projectbrief.md',
    title: 'Project Brief',
    purpose: 'Purpose, scope and core requirements',
  },
  {
    file: 'productContext.md',
    title: 'Product Context',
    purpose: 'Why it exists, the problems it solves and how it should behave for its users',
  },
  {
    file: 'systemPatterns.md',
    title: 'System Patterns',
    purpose: 'Architecture, key technical decisions, design patterns and component relationships',
  },
  {
    file: 'techContext.md',
    title: 'Tech Context',
    purpose: 'Technologies, dependencies, build and runtime setup, technical constraints',
  },
  {
    file: 'activeContext.md',
    title: 'Active Context',
    purpose: 'Current focus, recent changes and open decisions',
  },
  {
    file: 'progress.md',
    title: 'Progress',
    purpose: 'What works, what is left to build and known issues',
  },
  {
    file: 'tasks/_index.md',
    title: 'Tasks',
    purpose: 'Index of tasks with status',
  },
];

export const SECTION_FILES: readonly string[] = MEMORY_BANK_SECTIONS.map((s) => s.file);

/** Placeholder text that marks a section as not yet written. */
export const PLACEHOLDER_PATTERNS: readonly RegExp[] = [
  /\bTODO\b/,
  /\bTBD\b/,
  /\[Add content here\]/i,
  /\[Placeholder\]/i,
  /Lorem ipsum/i,
];
