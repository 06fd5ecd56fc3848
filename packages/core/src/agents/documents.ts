// packages/core/src/agents/documents.ts — Extract documents and JSON payloads from agent text

import { posix } from 'node:path';

export interface AgentDocument {
  path: string;
  content: string;
}

const FILE_BLOCK = /<file\s+path\s*=\s*"([^"]+)"\s*>\r?\n?([\s\S]*?)\r?\n?<\/file>/g;

/**
 * Normalize a document path to a safe relative POSIX path.
 * Returns null for absolute paths, parent traversal or empty results.
 */
export function normalizeDocumentPath(raw: string): string | null {
  const trimmed = raw.trim().replace(/\\/g, '/');
  if (trimmed.length === 0 || trimmed.startsWith('/') || /^[A-Za-z]:/.test(trimmed)) return null;
  const normalized = posix.normalize(trimmed);
  if (normalized === '.' || normalized.startsWith('../') || normalized === '..') return null;
  return normalized.replace(/^\.\//, '');
}

/**
 * Parse `<file path="...">...</file>` blocks. Blocks with unsafe paths are
 * skipped; their raw paths are returned in `rejected`.
 */
export function parseDocuments(text: string): { documents: AgentDocument[]; rejected: string[] } {
  const documents: AgentDocument[] = [];
  const rejected: string[] = [];
  for (const match of text.matchAll(FILE_BLOCK)) {
    const rawPath = match[1] ?? '';
    const path = normalizeDocumentPath(rawPath);
    if (path === null) {
      rejected.push(rawPath);
      continue;
    }
    documents.push({ path, content: `${(match[2] ?? '').trimEnd()}\n` });
  }
  return { documents, rejected };
}

/**
 * Pull the JSON payload out of agent text: the last ```json fenced block,
 * else the last fenced block, else the outermost brace span.
 * Returns undefined when nothing parses.
 */
export function extractJson(text: string): unknown {
  const fenced = [...text.matchAll(/```(json)?\s*\r?\n([\s\S]*?)```/g)];
  const candidates: string[] = [];
  const tagged = fenced.filter((m) => m[1] === 'json');
  for (const m of [...tagged.reverse(), ...fenced.reverse()]) {
    if (m[2]) candidates.push(m[2]);
  }
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1));

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      return parsed;
    } catch {
      // try the next candidate
    }
  }
  return undefined;
}
