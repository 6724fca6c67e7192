// src/config.ts - Environment-driven configuration for a calcline host
import * as path from 'path';
import { LogLevel, logLevels } from './logger';
import { keywordKinds } from './types';

export const APP_NAME = 'calcline';

export interface CalcConfig {
  storageRoot: string; // directory holding <profile>.yml files
  profile: string; // loaded at start when it exists
  logLevel: LogLevel;
}

interface ConfigResult {
  config: CalcConfig;
  warnings: string[];
}

export const defaultConfig: CalcConfig = {
  storageRoot: '.',
  profile: 'default',
  logLevel: 'warn',
};

const profileName = /^[A-Za-z][A-Za-z_]*$/;

function isLogLevel(value: string): value is LogLevel {
  return (logLevels as readonly string[]).includes(value);
}

/**
 * Per-user storage directory: %APPDATA%\calcline on Windows,
 * $HOME/.config/calcline elsewhere.
 */
export function resolveStorageRoot(
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform
): string {
  if (env.CALCLINE_HOME) return env.CALCLINE_HOME;
  if (platform === 'win32') {
    return env.APPDATA
      ? path.win32.join(env.APPDATA, APP_NAME)
      : defaultConfig.storageRoot;
  }
  return env.HOME
    ? path.posix.join(env.HOME, '.config', APP_NAME)
    : defaultConfig.storageRoot;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): ConfigResult {
  const warnings: string[] = [];
  const config: CalcConfig = {
    ...defaultConfig,
    storageRoot: resolveStorageRoot(env, platform),
  };

  const profile = env.CALCLINE_PROFILE;
  if (profile !== undefined) {
    if ((keywordKinds as readonly string[]).includes(profile)) {
      warnings.push(
        `Ignoring CALCLINE_PROFILE '${profile}': keywords cannot name a profile`
      );
    } else if (profileName.test(profile)) {
      config.profile = profile;
    } else {
      warnings.push(
        `Ignoring CALCLINE_PROFILE '${profile}': profile names are letters and underscores`
      );
    }
  }

  const level = env.CALCLINE_LOG_LEVEL;
  if (level !== undefined) {
    if (isLogLevel(level)) {
      config.logLevel = level;
    } else {
      warnings.push(
        `Ignoring CALCLINE_LOG_LEVEL '${level}': expected one of ${logLevels.join(', ')}`
      );
    }
  }

  return { config, warnings };
}
