// src/middleware/validateEnv.ts
import { z } from "zod";

const numericString = (fallback: string) =>
  z.string().regex(/^\d+$/, "must be a whole number").default(fallback);

/**
 * Environment variable validation schema.
 * Validates all required environment variables at startup.
 */
const envSchema = z.object({
  // Server
  PORT: numericString("3000"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Database (unset: in-memory demo store)
  DATABASE_URL: z.string().optional(),
  DATABASE_SSL: z.enum(["true", "false"]).default("false"),

  // JWT Authentication
  JWT_SECRET: z.string().min(32, "JWT_SECRET must be at least 32 characters"),
  JWT_EXPIRES_IN: z.string().regex(/^\d+[dhms]$/).default("12h"),
  JWT_REMEMBER_EXPIRES_IN: z.string().regex(/^\d+[dhms]$/).default("30d"),
  BCRYPT_ROUNDS: numericString("10"),

  // First account, created when no user exists yet
  ADMIN_USERNAME: z.string().optional(),
  ADMIN_PASSWORD: z.string().optional(),

  // Calendar
  APP_TIMEZONE: z
    .string()
    .default("America/Chicago")
    .refine((tz) => {
      try {
        new Intl.DateTimeFormat("en-US", { timeZone: tz });
        return true;
      } catch {
        return false;
      }
    }, "APP_TIMEZONE must be an IANA time zone"),

  // Goal form defaults
  DEFAULT_CALORIES_TARGET: numericString("2000"),
  DEFAULT_PROTEIN_TARGET: numericString("100"),

  // CORS
  ALLOWED_ORIGINS: z.string().optional(),

  // Login rate limiting
  LOGIN_RATE_LIMIT_WINDOW_MS: numericString("60000"),
  LOGIN_RATE_LIMIT_MAX: numericString("10"),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates environment variables at startup.
 * Throws if required variables are missing or invalid; warns about optional ones.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join(".")}: ${error.message}`);
    }
    throw new Error("Invalid environment configuration. See errors above.");
  }

  const validatedEnv = result.data;

  const warnings: string[] = [];

  if (!validatedEnv.DATABASE_URL) {
    warnings.push("DATABASE_URL is not set - meals are kept in memory and lost on restart");
  }

  if (Boolean(validatedEnv.ADMIN_USERNAME) !== Boolean(validatedEnv.ADMIN_PASSWORD)) {
    warnings.push("ADMIN_USERNAME and ADMIN_PASSWORD must be set together - bootstrap account skipped");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return validatedEnv;
}

export default validateEnvironment;
