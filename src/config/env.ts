import { z } from 'zod';

/**
 * Environment variables read by the library.
 * Both are optional; the browser backend enforces its own requirement.
 */
const envSchema = z.object({
  CHROME_EXECUTABLE_PATH: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

export const CHROME_EXECUTABLE_ENV_VAR = 'CHROME_EXECUTABLE_PATH';

/**
 * Parse the environment. Blank values count as unset.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new Error(`Environment validation failed: ${result.error.message}`);
  }
  return result.data;
}
