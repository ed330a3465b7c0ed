/**
 * Per-command setup: config, logger and services
 */

import {
  DEFAULT_CONFIG_FILE,
  loadConfig,
  type DeploymentConfig,
  type LoggerLike,
  type StepRecord,
} from '@wp-promote/shared';
import { closeLogger, createLogger, toLoggerLike } from '@wp-promote/logger';
import { getLocalExec } from '@wp-promote/exec';
import { createServices, type Services } from '@wp-promote/deployment';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export interface CommandContext {
  config: DeploymentConfig;
  log: LoggerLike;
  services: Services;
  close: () => Promise<void>;
}

export interface StepHooks {
  onStepStart?: (name: string) => void;
  onStepEnd?: (record: StepRecord) => void;
}

/** --config, then WP_PROMOTE_CONFIG, then ./deploy.conf */
export function resolveConfigPath(
  options: GlobalOptions,
  env: Record<string, string | undefined> = process.env,
): string {
  return options.config ?? env.WP_PROMOTE_CONFIG ?? DEFAULT_CONFIG_FILE;
}

export async function createContext(options: GlobalOptions, hooks: StepHooks = {}): Promise<CommandContext> {
  const config = await loadConfig(resolveConfigPath(options));
  const logger = createLogger({
    level: options.verbose ? 'debug' : 'info',
    consoleLevel: options.verbose ? 'debug' : 'warn',
    logDir: config.backupDir,
  });
  const log = toLoggerLike(logger);

  return {
    config,
    log,
    services: createServices(config, { runner: getLocalExec(), logger: log, ...hooks }),
    close: () => closeLogger(logger),
  };
}
