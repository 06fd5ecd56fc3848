// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a build job ID with "bld_" prefix. */
export function generateBuildId(): string {
  return `bld_${nanoid(16)}`;
}
