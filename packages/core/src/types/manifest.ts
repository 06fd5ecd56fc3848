// packages/core/src/types/manifest.ts — Architecture manifest types

export type ComponentKind = 'service' | 'library' | 'frontend' | 'layer';

export type SystemType =
  | 'microservices'
  | 'monolith'
  | 'modular_monolith'
  | 'serverless'
  | 'mixed'
  | 'unknown';

export interface ComponentDescriptor {
  id: string;
  name: string;
  kind: ComponentKind;
  /** Repository-relative globs owned by this component */
  globs: string[];
  /** Ids of components this one depends on */
  relationships: string[];
  description: string;
}

export interface ArchitectureManifest {
  systemType: SystemType;
  summary: string;
  components: ComponentDescriptor[];
  generatedAt: string;
}

/** Repository path -> owning component id. */
export type Ownership = ReadonlyMap<string, string>;
