/**
 * Log Configuration Test Suite
 *
 * Tests for environment-driven startup verbosity and the startup summary.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getLogConfig, initializeLogConfig, StartupLogger } from '../utils/logConfig.js';

vi.mock('@wgtechlabs/log-engine', () => ({
  LogEngine: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
  }
}));

import { LogEngine } from '@wgtechlabs/log-engine';

describe('Log Configuration', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    StartupLogger.reset();
  });

  afterEach(() => {
    initializeLogConfig('development');
  });

  describe('initializeLogConfig', () => {
    it('should use the development profile by default', () => {
      const config = initializeLogConfig('development');

      expect(config).toEqual({ level: 'info', startup: { verbose: false, summary: true } });
      expect(getLogConfig()).toBe(config);
    });

    it('should quiet startup in production', () => {
      expect(initializeLogConfig('production').level).toBe('warn');
    });

    it('should let LOG_LEVEL override the environment', () => {
      expect(initializeLogConfig('production', 'debug')).toEqual({
        level: 'debug',
        startup: { verbose: true, summary: true }
      });
      expect(initializeLogConfig('development', 'error').level).toBe('warn');
    });

    it('should log the chosen configuration', () => {
      initializeLogConfig('production');

      expect(LogEngine.info).toHaveBeenCalledWith('🔧 Log configuration initialized', {
        environment: 'production',
        level: 'warn',
        startupVerbose: false,
        customLevel: false
      });
    });
  });

  describe('StartupLogger', () => {
    it('should summarise registered commands in one line', () => {
      initializeLogConfig('development');
      vi.clearAllMocks();

      StartupLogger.logCommandRegistration('start', { listed: true });
      StartupLogger.logCommandRegistration('unknown', { listed: false });
      StartupLogger.showCommandRegistrationSummary();

      expect(LogEngine.info).toHaveBeenCalledTimes(1);
      expect(LogEngine.info).toHaveBeenCalledWith('📋 Registered 2 commands: start, unknown', {
        total: 2,
        listed: 1
      });
    });

    it('should log each command instead of a summary in verbose mode', () => {
      initializeLogConfig('development', 'debug');
      vi.clearAllMocks();

      StartupLogger.logCommandRegistration('help', { listed: true });
      StartupLogger.showCommandRegistrationSummary();

      expect(LogEngine.info).toHaveBeenCalledTimes(1);
      expect(LogEngine.info).toHaveBeenCalledWith('Registered command: help', { listed: true });
    });

    it('should include package, listeners and extra context in the startup summary', () => {
      initializeLogConfig('development');
      vi.clearAllMocks();

      StartupLogger.logPackageInfo({ name: 'github-telegram-relay', version: '1.2.3' });
      StartupLogger.logCommandRegistration('start', {});
      StartupLogger.logListener('webhook 0.0.0.0:8000');
      StartupLogger.logListener('status 0.0.0.0:5000');
      StartupLogger.showStartupSummary({ allowedChats: 2 });

      expect(LogEngine.info).toHaveBeenCalledWith('🚀 Bot startup complete', {
        version: '1.2.3',
        commands: 1,
        listeners: 'webhook 0.0.0.0:8000, status 0.0.0.0:5000',
        logLevel: 'info',
        verbose: false,
        allowedChats: 2
      });
    });
  });
});
