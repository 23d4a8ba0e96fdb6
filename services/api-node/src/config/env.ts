import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().default(4000),
  AUTH_SECRET: z.string().min(16).default("change-this-in-production-please"),
  EXPOSE_DEV_TOKENS: z
    .string()
    .optional()
    .transform((value) => value === "true"),
  REGISTRY_OWNER: z.string().min(1).default("registry-owner"),
  PERIOD_DURATION_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  PROPOSAL_DURATION_SECONDS: z.coerce.number().int().positive().default(3 * 24 * 60 * 60),
  QUORUM_PERCENT: z.coerce.number().int().min(1).max(100).default(50),
  MAX_MISSED_CONTRIBUTIONS: z.coerce.number().int().min(0).default(2),
  FINE_ESCALATION_THRESHOLD: z.coerce.number().int().positive().default(3),
  FINE_PERCENT: z.coerce.number().int().min(0).max(100).default(10),
  MIN_CONTRIBUTION: z.coerce.number().int().positive().default(100),
  MAX_CONTRIBUTION: z.coerce.number().int().positive().default(10_000_000),
  MIN_MEMBERS: z.coerce.number().int().min(2).default(3),
  MAX_MEMBERS: z.coerce.number().int().positive().default(100),
  MAX_GROUPS_PER_CREATOR: z.coerce.number().int().positive().default(10),
  MAX_GROUP_DURATION_SECONDS: z.coerce.number().int().positive().default(365 * 24 * 60 * 60),
  SIMULATED_OPENING_BALANCE: z.coerce.number().int().min(0).default(1_000_000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid env configuration: ${parsed.error.message}`);
}

export const env = parsed.data;
