import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    /** Pass / excellence thresholds on a 0–100 scale. */
    EVAL_PASS_THRESHOLD: z.coerce.number().min(0).max(100).default(60),
    EVAL_EXCELLENCE_THRESHOLD: z.coerce.number().min(0).max(100).default(85),
    /** Relative error that still earns full credit (0.05 = 5%). */
    NUMERIC_TOLERANCE: z.coerce.number().positive().max(1).default(0.05),
    /** Partial credit reaches zero at this multiple of the tolerance. */
    NUMERIC_FALLOFF_MULTIPLIER: z.coerce.number().gt(1).default(4),
    SANDBOX_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    SANDBOX_MEMORY_MB: z.coerce.number().int().min(16).default(64),
    /** Manufacturability score used when no reasoning judge is wired in. */
    QUALITATIVE_DEFAULT_SCORE: z.coerce.number().min(0).max(1).default(0.5)
  })
  .refine((v) => v.EVAL_EXCELLENCE_THRESHOLD >= v.EVAL_PASS_THRESHOLD, {
    message: "EVAL_EXCELLENCE_THRESHOLD must not be below EVAL_PASS_THRESHOLD",
    path: ["EVAL_EXCELLENCE_THRESHOLD"]
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issueText = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment variables: ${issueText}`);
}

export const env = parsed.data;

export type Env = typeof env;
