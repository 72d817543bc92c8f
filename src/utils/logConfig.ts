/**
 * Log Configuration Utility
 *
 * Chooses how chatty startup logging is for the current environment and
 * collects what was initialized into a single startup summary line.
 *
 * @since 2025
 */

import { LogEngine } from '@wgtechlabs/log-engine';
import type { PackageInfo } from './packageInfo.js';

export interface LogConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  startup: {
    verbose: boolean;
    summary: boolean;
  };
}

type LogContext = Record<string, unknown>;

/**
 * Default log configurations for different environments
 */
const LOG_CONFIGS = {
  development: {
    level: 'info',
    startup: { verbose: false, summary: true }
  },
  production: {
    level: 'warn',
    startup: { verbose: false, summary: true }
  },
  debug: {
    level: 'debug',
    startup: { verbose: true, summary: true }
  }
} as const satisfies Record<string, LogConfig>;

let currentConfig: LogConfig = LOG_CONFIGS.development;

/**
 * Initialize logging configuration from NODE_ENV and an optional LOG_LEVEL override
 */
export function initializeLogConfig(environment: string, logLevel?: string): LogConfig {
  switch (logLevel) {
    case 'debug':
      currentConfig = LOG_CONFIGS.debug;
      break;
    case 'info':
      currentConfig = LOG_CONFIGS.development;
      break;
    case 'warn':
    case 'error':
      currentConfig = LOG_CONFIGS.production;
      break;
    default:
      currentConfig = getConfigFromEnv(environment);
  }

  LogEngine.info('🔧 Log configuration initialized', {
    environment,
    level: currentConfig.level,
    startupVerbose: currentConfig.startup.verbose,
    customLevel: !!logLevel
  });

  return currentConfig;
}

function getConfigFromEnv(environment: string): LogConfig {
  if (environment === 'production') {
    return LOG_CONFIGS.production;
  }
  if (environment === 'debug') {
    return LOG_CONFIGS.debug;
  }
  return LOG_CONFIGS.development;
}

export function getLogConfig(): LogConfig {
  return currentConfig;
}

/**
 * Startup logger with summary mode
 */
export class StartupLogger {
  private static summaryData: {
    packageInfo?: PackageInfo;
    commands: Array<{ name: string; config: LogContext }>;
    listeners: string[];
  } = {
    commands: [],
    listeners: []
  };

  static logPackageInfo(packageInfo: PackageInfo): void {
    if (getLogConfig().startup.verbose) {
      LogEngine.debug('Package.json loaded successfully', {
        name: packageInfo.name,
        version: packageInfo.version
      });
    }
    this.summaryData.packageInfo = packageInfo;
  }

  /**
   * Log command registration (verbose or summary)
   */
  static logCommandRegistration(commandName: string, commandConfig: LogContext): void {
    if (getLogConfig().startup.verbose) {
      LogEngine.info(`Registered command: ${commandName}`, commandConfig);
    }
    this.summaryData.commands.push({ name: commandName, config: commandConfig });
  }

  /**
   * Show all registered commands in a single line
   */
  static showCommandRegistrationSummary(): void {
    if (this.summaryData.commands.length === 0 || getLogConfig().startup.verbose) {
      return;
    }

    const commandNames = this.summaryData.commands.map(cmd => cmd.name);
    const listed = this.summaryData.commands.filter(cmd => cmd.config.listed !== false).length;

    LogEngine.info(`📋 Registered ${commandNames.length} commands: ${commandNames.join(', ')}`, {
      total: commandNames.length,
      listed
    });
  }

  static logListener(name: string): void {
    this.summaryData.listeners.push(name);
  }

  /**
   * Show final startup summary
   */
  static showStartupSummary(context: LogContext = {}): void {
    const config = getLogConfig();
    if (!config.startup.summary) {
      return;
    }

    const { packageInfo, commands, listeners } = this.summaryData;
    LogEngine.info('🚀 Bot startup complete', {
      version: packageInfo?.version ?? 'unknown',
      commands: commands.length,
      listeners: listeners.join(', '),
      logLevel: config.level,
      verbose: config.startup.verbose,
      ...context
    });
  }

  static reset(): void {
    this.summaryData = { commands: [], listeners: [] };
  }
}
