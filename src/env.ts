import { Env } from './middleware/validateEnv';

/**
 * Settings the app needs at request time. Built once from the validated
 * environment and passed into createApp, so tests can build their own.
 */
export interface AppConfig {
  jwtSecret: string;
  jwtExpiresIn: string;
  jwtRememberExpiresIn: string;
  bcryptRounds: number;
  timeZone: string;
  goalDefaults: {
    caloriesPerDay: number;
    proteinGramsPerDay: number;
  };
  allowedOrigins?: string[];
  loginRateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  accessLog: boolean;
}

export function toAppConfig(env: Env): AppConfig {
  return {
    jwtSecret: env.JWT_SECRET,
    jwtExpiresIn: env.JWT_EXPIRES_IN,
    jwtRememberExpiresIn: env.JWT_REMEMBER_EXPIRES_IN,
    bcryptRounds: Number(env.BCRYPT_ROUNDS),
    timeZone: env.APP_TIMEZONE,
    goalDefaults: {
      caloriesPerDay: Number(env.DEFAULT_CALORIES_TARGET),
      proteinGramsPerDay: Number(env.DEFAULT_PROTEIN_TARGET),
    },
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(',').map((s) => s.trim()).filter(Boolean)
      : undefined,
    loginRateLimit: {
      windowMs: Number(env.LOGIN_RATE_LIMIT_WINDOW_MS),
      maxRequests: Number(env.LOGIN_RATE_LIMIT_MAX),
    },
    accessLog: env.NODE_ENV !== 'test',
  };
}
