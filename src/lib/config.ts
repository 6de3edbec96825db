import path from 'node:path';
import { z } from 'zod';

export interface AppConfig {
  readonly baseDir: string;
  readonly dataDir: string;
  readonly gageFile: string;
  readonly requestTimeoutMs: number;
  readonly pacingDelayMs: number;
  readonly retryDelayMs: number;
  readonly plotDays: number;
  readonly timeZone: string;
  readonly staleAfterHours: number;
}

const envSchema = z.object({
  RIVER_GRAPHS_HOME: z.string().min(1).optional(),
  RIVER_GRAPHS_DATA_DIR: z.string().min(1).optional(),
  RIVER_GRAPHS_GAGE_FILE: z.string().min(1).optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  PACING_DELAY_MS: z.coerce.number().int().nonnegative().default(3000),
  RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(3000),
  PLOT_DAYS: z.coerce.number().int().positive().default(7),
  GAGE_TIME_ZONE: z.string().min(1).default('America/Denver'),
  STALE_AFTER_HOURS: z.coerce.number().positive().default(2),
});

/**
 * Resolve the process configuration from the environment. Called once by an
 * entry point; everything else receives the result explicitly.
 *
 * @param cwd - fallback base directory when RIVER_GRAPHS_HOME is unset
 */
export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const baseDir = path.resolve(vars.RIVER_GRAPHS_HOME ?? cwd);

  return Object.freeze({
    baseDir,
    dataDir: path.resolve(baseDir, vars.RIVER_GRAPHS_DATA_DIR ?? 'data'),
    gageFile: path.resolve(baseDir, vars.RIVER_GRAPHS_GAGE_FILE ?? 'gages.csv'),
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    pacingDelayMs: vars.PACING_DELAY_MS,
    retryDelayMs: vars.RETRY_DELAY_MS,
    plotDays: vars.PLOT_DAYS,
    timeZone: vars.GAGE_TIME_ZONE,
    staleAfterHours: vars.STALE_AFTER_HOURS,
  });
}

let serverConfig: AppConfig | null = null;

// The Next.js server has no single entry point of ours, so it resolves once on first use
export function getServerConfig(): AppConfig {
  if (!serverConfig) {
    serverConfig = loadConfig();
  }
  return serverConfig;
}
