export const RUNNER_CONFIG = {
  /** Default wall-clock budget per execution (ms). */
  DEFAULT_TIMEOUT_MS: 5_000,
  /** Extra time the host watchdog waits past the budget before terminating the worker. */
  KILL_GRACE_MS: 1_000,
  /** Old-generation heap cap for the worker (MB). Best-effort only. */
  MEMORY_MB: 64,
  /** Max captured stdout size (bytes). */
  MAX_OUTPUT_BYTES: 16 * 1024,
  /** Max code length (bytes). */
  MAX_CODE_BYTES: 50 * 1024
};

/**
 * Names submitted code may not use as a variable. Checked after comments and
 * string literals are stripped, and again when a ReferenceError names one at
 * run time. Property names (`obj.process`, `{ process: 1 }`) are not uses.
 * `constructor` and `__proto__` are left to the context: it has no host
 * prototype and code generation from strings is disabled.
 */
export const FORBIDDEN_IDENTIFIERS: readonly string[] = [
  "require",
  "process",
  "import",
  "globalThis",
  "eval",
  "Function",
  "fetch",
  "Buffer",
  "WebAssembly",
  "XMLHttpRequest",
  "WebSocket"
];
