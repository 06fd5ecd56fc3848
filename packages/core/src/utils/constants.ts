// packages/core/src/utils/constants.ts — Shared magic number constants

/** Absolute ceiling for a single agent invocation, in milliseconds */
export const DEFAULT_AGENT_TIMEOUT_MS = 1_800_000;

/** Abort an invocation when no progress signal arrives for this long */
export const DEFAULT_IDLE_TIMEOUT_MS = 300_000;

/** Turn budgets per agent role */
export const ARCHITECTURE_MAX_TURNS = 200;
export const COMPONENT_MAX_TURNS = 100;
export const VALIDATION_MAX_TURNS = 50;
export const FIX_MAX_TURNS = 25;

/** Bounded pool sizes. Validation runs wider than generation. */
export const DEFAULT_COMPONENT_CONCURRENCY = 5;
export const DEFAULT_VALIDATION_CONCURRENCY = 10;

/** Retries after the first component attempt */
export const DEFAULT_COMPONENT_RETRIES = 1;

/** Base delay between component attempts */
export const DEFAULT_RETRY_BACKOFF_MS = 1000;

/** Confidence below this marks a component needs-review */
export const DEFAULT_ACCEPTANCE_THRESHOLD = 0.7;

/** Minimum characters for a section to count as complete */
export const DEFAULT_MIN_SECTION_CHARS = 200;

/** Concurrent builds accepted by the job manager */
export const DEFAULT_MAX_CONCURRENT_JOBS = 3;

/** Cap on captured subprocess output */
export const MAX_OUTPUT_BYTES = 2 * 1024 * 1024;

/** Repository listing entries sent to the architecture agent */
export const MAX_LISTING_ENTRIES = 5000;

/** Output layout */
export const MEMORY_BANK_DIR = 'memory-bank';
export const COMPONENTS_DIR = 'components';
export const STATE_DIR = '.membank';
export const STAGING_DIR = 'staging';
export const STATE_DB_FILE = 'state.db';
export const MANIFEST_JSON_FILE = 'architecture_manifest.json';
export const MANIFEST_MD_FILE = 'architecture_manifest.md';
export const CHANGELOG_FILE = 'changelog.md';
export const BUILD_SUMMARY_FILE = 'build_summary.json';
