/**
 * Configuration constants for the built-in tools.
 */

// ═══════════════════════════════════════════════════════════════════════════
// Filesystem tool config
// ═══════════════════════════════════════════════════════════════════════════

export const FILESYSTEM_CONFIG = {
  /** Hard cap on content size for write operations (1MB) */
  maxWriteSize: 1_000_000,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Command tool config
// ═══════════════════════════════════════════════════════════════════════════

export const COMMAND_CONFIG = {
  /** Characters of stdout/stderr kept in results */
  outputTailChars: 4_000,
  /** Grace period between SIGTERM and SIGKILL */
  killGraceMs: 2_000,
  /** Timeout when the directive gives none */
  defaultTimeoutSeconds: 120,
  /** Longer timeout attributes are capped to this */
  maxTimeoutSeconds: 600,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Web search config
// ═══════════════════════════════════════════════════════════════════════════

export const WEB_SEARCH_CONFIG = {
  defaultResults: 20,
  minResults: 1,
  maxResults: 50,
} as const;
