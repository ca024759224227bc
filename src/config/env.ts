import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CARD_PROVIDER: z.string().min(1).default('mock'),
  CARD_FETCH_DELAY_MS: z.coerce.number().int().nonnegative().default(300),
  CARD_ISSUER_NAME: z.string().min(1).default('NeoBank'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error(JSON.stringify({ level: 'error', message: 'Invalid env', issues: parsed.error.flatten().fieldErrors }));
    throw new Error('Invalid environment configuration');
  }
  return parsed.data;
}

export const env = loadEnv();
