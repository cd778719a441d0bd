import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const configSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
});

export type AppConfig = {
  env: z.infer<typeof configSchema>["NODE_ENV"];
  port: number;
  maxUploadBytes: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${fromZodError(parsed.error).message}`);
  }

  return {
    env: parsed.data.NODE_ENV,
    port: parsed.data.PORT,
    maxUploadBytes: Math.floor(parsed.data.MAX_UPLOAD_MB * 1024 * 1024),
  };
}
