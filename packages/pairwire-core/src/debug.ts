// Namespaced debug output.
//
// Uses DEBUG environment variable pattern matching (like npm's debug package):
//   DEBUG=pairwire:*         everything from this library
//   DEBUG=pairwire:peer      only the dispatch loop
//   DEBUG=*,-pairwire:rpc    everything except call logging

/** Log function bound to one namespace. */
export interface DebugLogger {
  (message: string, data?: Record<string, unknown>): void;
  readonly namespace: string;
  /** Whether output for this namespace is currently enabled. */
  enabled(): boolean;
}

/**
 * Check if a namespace is enabled by a DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, patterns: string | undefined = process.env.DEBUG): boolean {
  if (!patterns) return false;

  let enabled = false;
  for (const pattern of patterns.split(/[\s,]+/).filter(Boolean)) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for `namespace`.
 *
 * DEBUG is read on every call, so output can be switched on and off while the
 * process runs.
 */
export function createDebug(namespace: string): DebugLogger {
  const log = (message: string, data?: Record<string, unknown>): void => {
    if (!isEnabled(namespace)) return;
    if (data === undefined) {
      console.log(`${namespace} ${message}`);
    } else {
      console.log(`${namespace} ${message}`, data);
    }
  };
  log.namespace = namespace;
  log.enabled = () => isEnabled(namespace);
  return log;
}
