import { z } from "zod";

export const API_TITLE = "Vehicle Number Detection API";
export const API_VERSION = "1.0.0";

const MISSING_API_KEY = "GOOGLE_API_KEY is not set in environment variables";

const envSchema = z.object({
  GOOGLE_API_KEY: z
    .string({ required_error: MISSING_API_KEY })
    .trim()
    .min(1, MISSING_API_KEY),
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.0-flash"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
});

export interface AppConfig {
  readonly googleApiKey: string;
  readonly geminiModel: string;
  readonly port: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank values count as unset so the defaults apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== ""
    )
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const { fieldErrors } = result.error.flatten();
    const issues = Object.values(fieldErrors).flatMap(
      (messages) => messages ?? []
    );
    throw new ConfigError(issues);
  }

  return Object.freeze({
    googleApiKey: result.data.GOOGLE_API_KEY,
    geminiModel: result.data.GEMINI_MODEL,
    port: result.data.PORT,
  });
}
