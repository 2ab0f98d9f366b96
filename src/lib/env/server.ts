import { z } from "zod";

const ServerEnvSchema = z.object({
  // Anthropic (only needed when the re-extraction fallback is enabled)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  RE_EXTRACTION_MODEL: z.string().min(1).default("claude-sonnet-4-5-20250929"),
  RE_EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  // Static configuration tables
  UNDERWRITING_CONFIG_DIR: z.string().min(1).optional(),

  // Batch runs
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function serverEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid server environment variables (see logs).");
  }
  return parsed.data;
}
