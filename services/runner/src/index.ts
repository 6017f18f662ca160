import { runInWorker } from "./executor";
import { decodeOutputValue, findForbiddenIdentifier, isValidIdentifier } from "./harness";
import { RUNNER_CONFIG } from "./config";
import type { ExecutionResult } from "../../../packages/shared/src/types";

export type { ExecutionResult } from "../../../packages/shared/src/types";
export { findForbiddenIdentifier, stripCommentsAndStrings } from "./harness";

export interface ExecuteOptions {
  code: string;
  /** Variable whose final value is the result; when omitted the script's completion value is used. */
  resultVariable?: string;
  timeoutMs?: number;
  /** Heap budget for the worker. Enforced best-effort. */
  memoryMb?: number;
}

/** Returns an error message when the code exceeds the size cap, otherwise null. */
export function validateCodeSize(code: string): string | null {
  if (Buffer.byteLength(code, "utf8") > RUNNER_CONFIG.MAX_CODE_BYTES) {
    return `Code exceeds maximum size of ${RUNNER_CONFIG.MAX_CODE_BYTES / 1024}KB`;
  }
  return null;
}

function rejected(kind: ExecutionResult["error_kind"], message: string): ExecutionResult {
  return {
    succeeded: false,
    output_value: null,
    stdout_text: "",
    error_kind: kind,
    error_message: message,
    duration_ms: 0
  };
}

/**
 * Execute untrusted JavaScript in an isolated worker and return a structured
 * result. Never throws; every failure becomes an ExecutionResult.
 */
export async function executeCode(options: ExecuteOptions): Promise<ExecutionResult> {
  const { code, resultVariable } = options;
  const sizeError = validateCodeSize(code);
  if (sizeError) return rejected("RuntimeFault", sizeError);
  if (resultVariable != null && !isValidIdentifier(resultVariable)) {
    return rejected("RuntimeFault", `Invalid result variable name: ${resultVariable}`);
  }
  const forbidden = findForbiddenIdentifier(code);
  if (forbidden) {
    return rejected("ForbiddenOperation", `Use of '${forbidden}' is not allowed in submitted code`);
  }

  const run = await runInWorker({
    code,
    resultVariable: resultVariable ?? null,
    timeoutMs: options.timeoutMs ?? RUNNER_CONFIG.DEFAULT_TIMEOUT_MS,
    memoryMb: options.memoryMb ?? RUNNER_CONFIG.MEMORY_MB
  });

  return {
    succeeded: run.ok,
    output_value: run.ok ? decodeOutputValue(run.value) : null,
    stdout_text: run.stdout,
    error_kind: run.error_kind,
    error_message: run.error_message,
    duration_ms: run.runtime_ms
  };
}
