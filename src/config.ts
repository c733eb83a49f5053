import { z } from 'zod';

const EnvSchema = z.object({
  PLUGIN_DIR: z.string().min(1).default('plugin'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PLUGIN_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return EnvSchema.parse(env);
}

const config = loadConfig();

export const PLUGIN_DIR = config.PLUGIN_DIR;
export const HOST = config.HOST;
export const PORT = config.PORT;
export const LOG_LEVEL = config.LOG_LEVEL;
export const PLUGIN_LOAD_TIMEOUT_MS = config.PLUGIN_LOAD_TIMEOUT_MS;
