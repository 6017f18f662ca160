import { Worker } from "node:worker_threads";
import { FORBIDDEN_IDENTIFIERS, RUNNER_CONFIG } from "./config";
import { CONTEXT_BOOTSTRAP, WorkerMessageSchema, generateWorkerSource } from "./harness";
import type { ExecutionErrorKind } from "../../../packages/shared/src/types";

export interface WorkerJob {
  code: string;
  resultVariable: string | null;
  timeoutMs: number;
  memoryMb: number;
}

export interface WorkerOutcome {
  ok: boolean;
  value: string | null;
  stdout: string;
  error_kind: ExecutionErrorKind | null;
  error_message: string | null;
  runtime_ms: number;
}

const WORKER_SOURCE = generateWorkerSource();

function truncate(s: string, max: number): string {
  if (Buffer.byteLength(s, "utf8") <= max) return s;
  return s.slice(0, max) + "\n...[truncated]";
}

function stopWorker(worker: Worker): void {
  worker.terminate().catch((err: unknown) => {
    console.error("[runner] Failed to terminate worker:", err);
  });
}

/**
 * Run one job in a dedicated worker. The vm timeout interrupts synchronous
 * loops inside the worker; the kill timer terminates the whole worker if that
 * does not settle within the grace period. Always resolves.
 */
export function runInWorker(job: WorkerJob): Promise<WorkerOutcome> {
  return new Promise((resolve) => {
    const start = Date.now();
    let settled = false;
    let worker: Worker | null = null;
    let killTimer: NodeJS.Timeout | undefined;

    const finish = (outcome: Omit<WorkerOutcome, "runtime_ms">) => {
      if (settled) return;
      settled = true;
      clearTimeout(killTimer);
      if (worker) stopWorker(worker);
      resolve({ ...outcome, runtime_ms: Date.now() - start });
    };

    try {
      worker = new Worker(WORKER_SOURCE, {
        eval: true,
        workerData: {
          code: job.code,
          bootstrap: CONTEXT_BOOTSTRAP,
          resultVariable: job.resultVariable,
          timeoutMs: job.timeoutMs,
          maxOutputBytes: RUNNER_CONFIG.MAX_OUTPUT_BYTES,
          forbidden: FORBIDDEN_IDENTIFIERS
        },
        resourceLimits: { maxOldGenerationSizeMb: job.memoryMb },
        stdout: true,
        stderr: true
      });
    } catch (err) {
      finish({
        ok: false,
        value: null,
        stdout: "",
        error_kind: "RuntimeFault",
        error_message: `Sandbox failed to start: ${err instanceof Error ? err.message : String(err)}`
      });
      return;
    }

    killTimer = setTimeout(() => {
      finish({
        ok: false,
        value: null,
        stdout: "",
        error_kind: "Timeout",
        error_message: `Time limit of ${job.timeoutMs}ms exceeded`
      });
    }, job.timeoutMs + RUNNER_CONFIG.KILL_GRACE_MS);

    worker.once("message", (raw: unknown) => {
      const parsed = WorkerMessageSchema.safeParse(raw);
      if (!parsed.success) {
        finish({
          ok: false,
          value: null,
          stdout: "",
          error_kind: "RuntimeFault",
          error_message: "Sandbox returned a malformed result"
        });
        return;
      }
      const msg = parsed.data;
      const stdout = truncate(msg.stdout, RUNNER_CONFIG.MAX_OUTPUT_BYTES);
      if (msg.status === "ok") {
        finish({ ok: true, value: msg.value, stdout, error_kind: null, error_message: null });
      } else {
        finish({ ok: false, value: null, stdout, error_kind: msg.kind, error_message: msg.message });
      }
    });

    worker.once("error", (err: Error) => {
      finish({
        ok: false,
        value: null,
        stdout: "",
        error_kind: "RuntimeFault",
        error_message: err.message.slice(0, 500)
      });
    });

    worker.once("exit", (code) => {
      finish({
        ok: false,
        value: null,
        stdout: "",
        error_kind: "RuntimeFault",
        error_message: `Sandbox exited with code ${code} before reporting a result`
      });
    });
  });
}
