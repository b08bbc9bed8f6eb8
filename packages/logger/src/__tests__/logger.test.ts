import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { resolveLoggerEnv, validateLoggerEnv } from '../env.schema.js';
import { formatLabel, getLogger, resetLogger, setLoggerTransports } from '../pino-logger.js';

describe('validateLoggerEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const config = validateLoggerEnv({});

    expect(config.LOGGER_CONSOLE_ENABLED).toBe(true);
    expect(config.LOGGER_FILE_LOG_ENABLED).toBe(false);
    expect(config.LOGGER_FILE_LOG_FILENAME).toBe('application.log');
    expect(config.LOGGER_LOG_DIRNAME).toBe('logs');
    expect(config.LOGGER_LOG_LEVEL).toBe('info');
    expect(config.LOGGER_SERVICE_NAME).toBe('fintick');
    expect(config.NODE_ENV).toBe('development');
  });

  it('should parse boolean flags from strings', () => {
    const config = validateLoggerEnv({ LOGGER_CONSOLE_ENABLED: 'false', LOGGER_FILE_LOG_ENABLED: 'true' });

    expect(config.LOGGER_CONSOLE_ENABLED).toBe(false);
    expect(config.LOGGER_FILE_LOG_ENABLED).toBe(true);
  });

  it('should reject an unknown log level', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_LEVEL: 'verbose' })).toThrow(/LOGGER_LOG_LEVEL/);
  });

  it('should reject a blank log directory', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_DIRNAME: '   ' })).toThrow('Invalid log directory name');
  });
});

describe('resolveLoggerEnv', () => {
  it('should return the parsed config for a valid environment', () => {
    const { config, issues } = resolveLoggerEnv({ LOGGER_LOG_LEVEL: 'warn' });

    expect(config.LOGGER_LOG_LEVEL).toBe('warn');
    expect(issues).toEqual([]);
  });

  it('should default rejected variables and keep the valid ones', () => {
    const { config, issues } = resolveLoggerEnv({ LOGGER_LOG_LEVEL: 'verbose', LOGGER_SERVICE_NAME: 'desk' });

    expect(config.LOGGER_LOG_LEVEL).toBe('info');
    expect(config.LOGGER_SERVICE_NAME).toBe('desk');
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^LOGGER_LOG_LEVEL: /);
  });
});

describe('formatLabel', () => {
  it('should left-pad short labels', () => {
    expect(formatLabel('money', 8)).toBe('   money');
  });

  it('should truncate long labels with a leading ellipsis', () => {
    expect(formatLabel('serialization', 6)).toBe('…ation');
  });
});

describe('getLogger', () => {
  beforeEach(() => {
    resetLogger();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetLogger();
  });

  it('should bind the category to the child logger', () => {
    const logger = getLogger('currency');

    expect(logger.bindings()).toMatchObject({ category: 'currency' });
  });

  it('should use the configured log level', () => {
    vi.stubEnv('LOGGER_LOG_LEVEL', 'debug');
    resetLogger();

    expect(getLogger('money').level).toBe('debug');
  });

  it('should fall back to defaults when the environment is invalid', () => {
    vi.stubEnv('LOGGER_LOG_LEVEL', 'verbose');
    resetLogger();

    const logger = getLogger('money');

    expect(logger.level).toBe('info');
    expect(() => logger.warn('still logging')).not.toThrow();
  });

  it('should keep working after transports are reconfigured', () => {
    const logger = getLogger('money');
    setLoggerTransports({ console: false, file: false });

    expect(() => logger.info({ amount: '1.00' }, 'after reconfiguration')).not.toThrow();
    expect(logger.bindings()).toMatchObject({ category: 'money' });
  });
});
