import { z } from "zod";
import { FORBIDDEN_IDENTIFIERS } from "./config";

const IDENTIFIER_RE = /^[A-Za-z_$][\w$]*$/;
const TOKEN_RE = /[A-Za-z_$][\w$]*/g;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}

/**
 * Replace comments and the contents of string/template literals with spaces so
 * the identifier screen only sees code. Regex literals are not recognised.
 */
export function stripCommentsAndStrings(code: string): string {
  let out = "";
  let i = 0;
  while (i < code.length) {
    const ch = code[i];
    const next = code[i + 1];
    if (ch === "/" && next === "/") {
      while (i < code.length && code[i] !== "\n") i++;
      out += " ";
      continue;
    }
    if (ch === "/" && next === "*") {
      const end = code.indexOf("*/", i + 2);
      i = end === -1 ? code.length : end + 2;
      out += " ";
      continue;
    }
    if (ch === "'" || ch === '"' || ch === "`") {
      i++;
      while (i < code.length && code[i] !== ch) {
        i += code[i] === "\\" ? 2 : 1;
      }
      i++;
      out += " ";
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

function previousNonSpace(text: string, index: number): number {
  let i = index - 1;
  while (i >= 0 && /\s/.test(text[i])) i--;
  return i;
}

function nextNonSpace(text: string, index: number): number {
  let i = index;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

/**
 * A token is a property name when it follows a single `.` (member access,
 * not spread) or sits between `{`/`,` and `:` (object literal key).
 */
function isPropertyName(text: string, start: number, end: number): boolean {
  const before = previousNonSpace(text, start);
  if (before >= 0 && text[before] === "." && text[before - 1] !== ".") return true;
  const after = nextNonSpace(text, end);
  return text[after] === ":" && before >= 0 && (text[before] === "{" || text[before] === ",");
}

/** First forbidden identifier the code uses outside comments, strings and property names, or null. */
export function findForbiddenIdentifier(code: string): string | null {
  const forbidden = new Set(FORBIDDEN_IDENTIFIERS);
  const text = stripCommentsAndStrings(code);
  for (const match of text.matchAll(TOKEN_RE)) {
    const name = match[0];
    const start = match.index ?? 0;
    if (forbidden.has(name) && !isPropertyName(text, start, start + name.length)) return name;
  }
  return null;
}

/**
 * Runs first inside the fresh context. Everything submitted code can call is
 * created here, in the context's own realm, so no host object is reachable.
 */
export const CONTEXT_BOOTSTRAP = `
(function (root) {
  "use strict";
  var limit = root.__maxOutputBytes;
  delete root.__maxOutputBytes;
  var lines = [];
  var used = 0;
  var truncated = false;
  function format(value) {
    if (typeof value === "string") return value;
    try {
      var text = JSON.stringify(value);
      return text === undefined ? String(value) : text;
    } catch (err) {
      return String(value);
    }
  }
  function write() {
    if (truncated) return;
    var parts = [];
    for (var i = 0; i < arguments.length; i++) parts.push(format(arguments[i]));
    var line = parts.join(" ");
    if (used + line.length + 1 > limit) {
      lines.push(line.slice(0, Math.max(0, limit - used)) + "...[truncated]");
      truncated = true;
      return;
    }
    used += line.length + 1;
    lines.push(line);
  }
  function define(name, value) {
    Object.defineProperty(root, name, { value: value, writable: true, configurable: true, enumerable: false });
  }
  var math = Object.create(null);
  Object.getOwnPropertyNames(Math).forEach(function (key) { math[key] = Math[key]; });
  math.pi = Math.PI;
  math.e = Math.E;
  math.radians = function (deg) { return deg * Math.PI / 180; };
  math.degrees = function (rad) { return rad * 180 / Math.PI; };
  define("console", Object.freeze({ log: write, info: write, warn: write, error: write }));
  define("print", write);
  define("math", Object.freeze(math));
  define("pi", Math.PI);
  define("e", Math.E);
  define("__drainStdout", function () { return lines.join("\\n"); });
  define("__serialize", function (value) {
    if (value === undefined || value === null) return JSON.stringify({ kind: "none" });
    if (typeof value === "number") return JSON.stringify({ kind: "number", repr: String(value) });
    try {
      return JSON.stringify({ kind: "json", value: value });
    } catch (err) {
      return JSON.stringify({ kind: "opaque", repr: "[unserializable value]" });
    }
  });
})(this);
`.trim();

/**
 * Source of the worker that hosts one execution. It builds a null-prototype
 * context with code generation disabled, runs the bootstrap, the submission and
 * the result extraction under the vm timeout, and posts exactly one message.
 */
export function generateWorkerSource(): string {
  return `
const { parentPort, workerData } = require("node:worker_threads");
const vm = require("node:vm");

const { code, bootstrap, resultVariable, timeoutMs, maxOutputBytes, forbidden } = workerData;
const sandbox = Object.create(null);
sandbox.__maxOutputBytes = maxOutputBytes;
const context = vm.createContext(sandbox, {
  name: "submission",
  codeGeneration: { strings: false, wasm: false },
  microtaskMode: "afterEvaluate"
});

function run(source, filename) {
  return new vm.Script(source, { filename: filename }).runInContext(context, { timeout: timeoutMs, displayErrors: false });
}

function classify(err) {
  let name = "Error";
  let message = "";
  let errCode;
  try {
    name = String(err && err.name);
    message = String(err && err.message);
    errCode = err && typeof err === "object" ? err.code : undefined;
  } catch (inner) {
    message = "Unreadable error thrown by submission";
  }
  if (errCode === "ERR_SCRIPT_EXECUTION_TIMEOUT" || /Script execution timed out/.test(message)) {
    return { kind: "Timeout", message: message };
  }
  if (name === "EvalError" || /Code generation from strings disallowed/.test(message)) {
    return { kind: "ForbiddenOperation", message: message };
  }
  if (errCode === "ERR_VM_DYNAMIC_IMPORT_CALLBACK_MISSING" || errCode === "ERR_VM_DYNAMIC_IMPORT_CALLBACK_MISSING_FLAG") {
    return { kind: "ForbiddenOperation", message: message };
  }
  const ref = /^(\\S+) is not defined$/.exec(message);
  if (name === "ReferenceError" && ref && forbidden.includes(ref[1])) {
    return { kind: "ForbiddenOperation", message: message };
  }
  return { kind: "RuntimeFault", message: name + ": " + message };
}

function drain() {
  try {
    const out = run("__drainStdout()", "stdout.js");
    return typeof out === "string" ? out : "";
  } catch (err) {
    return "";
  }
}

try {
  run(bootstrap, "bootstrap.js");
  const completion = run(code, "submission.js");
  let serialized;
  if (resultVariable) {
    serialized = run(
      "__serialize(typeof " + resultVariable + " === 'undefined' ? undefined : " + resultVariable + ")",
      "result.js"
    );
  } else {
    sandbox.__completion = completion;
    serialized = run("__serialize(__completion)", "result.js");
  }
  parentPort.postMessage({ status: "ok", value: typeof serialized === "string" ? serialized : null, stdout: drain() });
} catch (err) {
  const failure = classify(err);
  parentPort.postMessage({ status: "error", kind: failure.kind, message: failure.message.slice(0, 500), stdout: drain() });
}
`.trim();
}

export const WorkerMessageSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), value: z.string().nullable(), stdout: z.string() }),
  z.object({
    status: z.literal("error"),
    kind: z.enum(["Timeout", "RuntimeFault", "ForbiddenOperation"]),
    message: z.string(),
    stdout: z.string()
  })
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

const SerializedValueSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("none") }),
  z.object({ kind: z.literal("number"), repr: z.string() }),
  z.object({ kind: z.literal("json"), value: z.unknown() }),
  z.object({ kind: z.literal("opaque"), repr: z.string() })
]);

/** Turn the context's serialized result back into a plain value; numbers keep NaN/Infinity. */
export function decodeOutputValue(serialized: string | null): unknown {
  if (serialized == null) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(serialized);
  } catch {
    return null;
  }
  const parsed = SerializedValueSchema.safeParse(raw);
  if (!parsed.success) return null;
  switch (parsed.data.kind) {
    case "none":
      return null;
    case "number":
      return Number(parsed.data.repr);
    case "json":
      return parsed.data.value ?? null;
    case "opaque":
      return parsed.data.repr;
  }
}
