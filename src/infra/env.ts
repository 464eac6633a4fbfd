import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file into process.env
dotenv.config();

// Zod schema validates environment variables at runtime
// .default() provides fallback if not set
export const EnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('data/library.db'),
  POLICY_PATH: z.string().min(1).default('config/policy.json'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // Unset means the surface picks its own default
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

// Throws if validation fails
export const env = EnvSchema.parse(process.env);
