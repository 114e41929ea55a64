import * as os from 'os';
import { z } from 'zod';
import { createConfigError } from './errors.js';
import { LogLevel, parseLogLevel } from './logging.js';

/**
 * Runtime configuration, read from the environment
 */
export interface TreeConfig {
  logLevel: LogLevel;
  fetchTimeoutMs: number;
  scratchDir: string;
  catalogPath?: string;
  sshKeyPath?: string;
  sshPassword?: string;
  sshAgent?: string;
}

const EnvSchema = z.object({
  LOG_LEVEL: z.string().optional(),
  TREE_FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).optional().default(30000),
  TREE_SCRATCH_DIR: z.string().min(1).optional(),
  TREE_OS_CATALOG: z.string().min(1).optional(),
  TREE_SSH_KEY_PATH: z.string().min(1).optional(),
  TREE_SSH_PASSWORD: z.string().optional(),
  SSH_AUTH_SOCK: z.string().optional()
});

/**
 * Builds the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TreeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw createConfigError(
      `Invalid configuration: ${issue.path.join('.')} ${issue.message}`,
      'Check the TREE_* environment variables'
    );
  }

  const values = parsed.data;
  return {
    logLevel: parseLogLevel(values.LOG_LEVEL),
    fetchTimeoutMs: values.TREE_FETCH_TIMEOUT_MS,
    scratchDir: values.TREE_SCRATCH_DIR ?? os.tmpdir(),
    catalogPath: values.TREE_OS_CATALOG,
    sshKeyPath: values.TREE_SSH_KEY_PATH,
    sshPassword: values.TREE_SSH_PASSWORD,
    sshAgent: values.SSH_AUTH_SOCK
  };
}
