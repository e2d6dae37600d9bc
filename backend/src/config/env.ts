import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('3001'),

  // Database type
  DB_TYPE: z.enum(['sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().default('./rag.db'),

  // PostgreSQL (optional if using sqlite)
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().transform(Number).default('5432'),
  DB_NAME: z.string().default('rag'),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),

  // CORS
  FRONTEND_URL: z.string().default('http://localhost:5173'),

  // Local server only; Lambda relies on API Gateway throttling
  RATE_LIMIT_PER_MINUTE: z.string().transform(Number).pipe(z.number().int().positive()).default('100'),

  // Writable scratch space; Lambda only allows writes under /tmp
  SCRATCH_DIR: z.string().min(1).default('/tmp'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    throw new Error('Invalid environment variables');
  }

  if (result.data.DB_TYPE === 'postgres') {
    if (!result.data.DB_USER || !result.data.DB_PASSWORD) {
      throw new Error('DB_USER and DB_PASSWORD required when DB_TYPE=postgres');
    }
  }

  return result.data;
}

function loadEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

export const env = loadEnv();
