// packages/core/src/agents/manifest.ts — Manifest schema, validation and the implicit root component

import { z } from 'zod';
import { resolveOwnership } from '../changes/change-tracker.js';
import type { ArchitectureManifest, ComponentDescriptor } from '../types/manifest.js';
import { ManifestError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const ROOT_COMPONENT_ID = 'root';

const SAFE_ID = /^[a-z0-9][a-z0-9._-]{0,63}$/i;
const RESERVED_IDS = new Set(['.', '..', 'con', 'prn', 'aux', 'nul']);

const componentSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  kind: z.enum(['service', 'library', 'frontend', 'layer']).catch('layer'),
  globs: z.array(z.string()).default([]),
  relationships: z.array(z.string()).default([]),
  description: z.string().default(''),
});

const manifestSchema = z.object({
  systemType: z
    .enum(['microservices', 'monolith', 'modular_monolith', 'serverless', 'mixed', 'unknown'])
    .catch('unknown'),
  summary: z.string().default(''),
  components: z.array(componentSchema).default([]),
  generatedAt: z.string().optional(),
});

export function isSafeComponentId(id: string): boolean {
  return SAFE_ID.test(id) && !RESERVED_IDS.has(id.toLowerCase());
}

function normalizeGlob(glob: string): string {
  const trimmed = glob.trim().replace(/\\/g, '/').replace(/^\.\//, '');
  // A bare directory owns everything beneath it
  return trimmed.endsWith('/') ? `${trimmed}**` : trimmed;
}

function rootComponent(id: string): ComponentDescriptor {
  return {
    id,
    name: 'Root',
    kind: 'layer',
    globs: ['**'],
    relationships: [],
    description: 'Files not claimed by any other component',
  };
}

/**
 * Validate raw manifest data. Throws ManifestError for structural problems,
 * duplicate ids (case-insensitive, as they share an output directory) and
 * ids unsafe as directory names. Relationships to unknown ids are dropped
 * with a warning.
 */
export function validateManifest(raw: unknown, logger?: Logger): ArchitectureManifest {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ManifestError(`Invalid manifest: ${issues}`);
  }
  const data = parsed.data;

  const seen = new Set<string>();
  for (const c of data.components) {
    if (!isSafeComponentId(c.id)) {
      throw new ManifestError(`Component id "${c.id}" is not usable as a directory name`, c.id);
    }
    const key = c.id.toLowerCase();
    if (seen.has(key)) {
      throw new ManifestError(`Duplicate component id "${c.id}"`, c.id);
    }
    seen.add(key);
  }

  const ids = new Set(data.components.map((c) => c.id));
  const components: ComponentDescriptor[] = data.components.map((c) => {
    const relationships: string[] = [];
    for (const rel of c.relationships) {
      if (rel === c.id) continue;
      if (!ids.has(rel)) {
        logger?.warn(`Component "${c.id}" references unknown component "${rel}"; dropped`);
        continue;
      }
      if (!relationships.includes(rel)) relationships.push(rel);
    }
    return {
      id: c.id,
      name: c.name ?? c.id,
      kind: c.kind,
      globs: c.globs.map(normalizeGlob).filter((g) => g.length > 0),
      relationships,
      description: c.description,
    };
  });

  return {
    systemType: data.systemType,
    summary: data.summary,
    components,
    generatedAt: data.generatedAt ?? new Date().toISOString(),
  };
}

/**
 * Ensure every path has an owner: with no components the manifest becomes a
 * single root component; otherwise a root component spanning `**` is
 * appended when some paths are unclaimed.
 */
export function withImplicitRoot(manifest: ArchitectureManifest, paths: Iterable<string>): ArchitectureManifest {
  if (manifest.components.length === 0) {
    return { ...manifest, components: [rootComponent(ROOT_COMPONENT_ID)] };
  }
  const all = [...paths];
  const owned = resolveOwnership(manifest, all);
  if (owned.size === all.length) return manifest;

  const taken = new Set(manifest.components.map((c) => c.id.toLowerCase()));
  let id = ROOT_COMPONENT_ID;
  for (let n = 2; taken.has(id); n++) id = `${ROOT_COMPONENT_ID}-${n}`;
  return { ...manifest, components: [...manifest.components, rootComponent(id)] };
}
