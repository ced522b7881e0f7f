import { z } from 'zod';

const DEFAULT_ORIGINS = 'http://localhost:5173,http://127.0.0.1:5173';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGINS: z.string().default(DEFAULT_ORIGINS),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(30),
});

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  maxUploadBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
    maxUploadBytes: Math.round(parsed.MAX_UPLOAD_MB * 1024 * 1024),
  };
}
