// packages/core/src/config/defaults.ts

import type { MembankConfig } from '../types/config.js';
import { validateConfig } from './schema.js';

/** Every field at its schema default. */
export const DEFAULT_CONFIG: MembankConfig = validateConfig({});
