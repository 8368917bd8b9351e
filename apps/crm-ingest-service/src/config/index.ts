import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

/**
 * Environment configuration
 */
const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),

  // Supabase (in-memory store when unset)
  SUPABASE_URL: z.string().default(""),
  SUPABASE_SERVICE_KEY: z.string().default(""),

  // Payload keys never turned into fields by auto-create
  INGEST_EXCLUDED_FIELDS: z.string().default("IDLOTE,USUARIO_PREASIGNADO"),
  INGEST_BODY_LIMIT: z.string().min(1).default("1mb"),

  NODE_ENV: z.string().default("development"),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const details = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment configuration: ${details}`);
}

const env = parsed.data;

export const config = Object.freeze({
  port: env.PORT,

  supabaseUrl: env.SUPABASE_URL,
  supabaseServiceKey: env.SUPABASE_SERVICE_KEY,

  excludedFields: env.INGEST_EXCLUDED_FIELDS.split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0),
  jsonBodyLimit: env.INGEST_BODY_LIMIT,

  nodeEnv: env.NODE_ENV,
});
