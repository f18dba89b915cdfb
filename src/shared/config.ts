import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { globalConfigPath, projectConfigPath } from './paths.js';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  scriptsDir: z.string().min(1),
  heartbeatIntervalSeconds: z.number().int().positive(),
  statusPollSeconds: z.number().int().positive(),
  multiplexer: z.enum(['auto', 'screen', 'tmux', 'none']),
  sweepStaleMonitors: z.boolean(),
  logLevel: z.enum(LOG_LEVELS),
});

export type Config = z.infer<typeof configSchema>;

const partialConfigSchema = configSchema.partial().strict();

export const DEFAULT_CONFIG: Config = {
  scriptsDir: 'scripts',
  heartbeatIntervalSeconds: 60,
  statusPollSeconds: 10,
  multiplexer: 'auto',
  sweepStaleMonitors: true,
  logLevel: 'info',
};

function readJsonFile(filePath: string): Partial<Config> {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(filePath, err instanceof Error ? err.message : String(err));
  }

  const parsed = partialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(filePath, detail);
  }
  return parsed.data;
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<Config> {
  const level = z.enum(LOG_LEVELS).safeParse(env['NEXUS_LOG_LEVEL']);
  return level.success ? { logLevel: level.data } : {};
}

export interface LoadConfigOpts {
  globalPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(cwd: string, opts: LoadConfigOpts = {}): Config {
  const global = readJsonFile(opts.globalPath ?? globalConfigPath());
  const project = readJsonFile(projectConfigPath(cwd));
  return { ...DEFAULT_CONFIG, ...global, ...project, ...envOverrides(opts.env ?? process.env) };
}
