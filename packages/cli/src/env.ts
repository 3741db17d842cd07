import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

// Only vars the CLI itself reads. Connection settings from the environment
// sit between command-line flags and the config file in precedence.
const cliEnvSchema = z.object({
  FIELDLINK_HOME: z.string().optional(),
  FIELDLINK_API_URL: z.string().url().optional(),
  FIELDLINK_API_TOKEN: z.string().optional(),
  FIELDLINK_PROJECT: z.string().optional(),
  FIELDLINK_DIRECTORY_URL: z.string().url().optional(),
  FIELDLINK_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
});

export type CliEnv = z.infer<typeof cliEnvSchema>;

/**
 * Parse the environment; empty strings count as unset.
 *
 * @throws {Error} naming every variable that failed validation
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): CliEnv {
  const present = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== ''));
  const result = cliEnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }
  return result.data;
}

/** Directory holding config.json and logs/. */
export function fieldlinkHome(cliEnv: Pick<CliEnv, 'FIELDLINK_HOME'> = {}): string {
  return cliEnv.FIELDLINK_HOME || process.env.FIELDLINK_HOME || path.join(os.homedir(), '.fieldlink');
}
