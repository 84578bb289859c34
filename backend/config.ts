import * as dotenv from 'dotenv';
import { z } from 'zod';
import { coercedBoolean } from './schema';

// Invalid values fall back to their defaults; nothing here stops the service from starting
const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_NAME: z.string().min(1).optional(),
  DATABASE_SSL: coercedBoolean.default(false).catch(false),
  PORT: z.coerce.number().int().min(0).max(65535).catch(8000),
  // '*' reflects whatever origin the browser sends
  CORS_ORIGIN: z.string().min(1).default('*'),
  NODE_ENV: z.string().default('development')
});

export interface AppConfig {
  databaseUrl?: string;
  databaseName?: string;
  databaseSsl: boolean;
  port: number;
  corsOrigin: string;
  nodeEnv: string;
}

/*
  Reads configuration from an environment map.
  Empty strings count as unset, the way a blank line in .env usually means "not configured".
*/
export function readConfig(env: NodeJS.ProcessEnv): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.parse(present);

  return {
    databaseUrl: parsed.DATABASE_URL,
    databaseName: parsed.DATABASE_NAME,
    databaseSsl: parsed.DATABASE_SSL,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    nodeEnv: parsed.NODE_ENV
  };
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return readConfig(process.env);
}
