import { afterEach, describe, expect, it, vi } from 'vitest';
import { allowConsole } from '../../../helpers/tests/console-guard';
import { getLogger } from '../src/logger';

describe('getLogger', () => {
  afterEach(() => {
    delete process.env.AGENTLOOP_DONT_LOG_MODEL_DATA;
    delete process.env.AGENTLOOP_DONT_LOG_TOOL_DATA;
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it('uses the given namespace', () => {
    expect(getLogger('agentloop:test').namespace).toBe('agentloop:test');
    expect(getLogger().namespace).toBe('agentloop');
  });

  it('writes warnings and errors to the console', () => {
    allowConsole(['warn', 'error']);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = getLogger('agentloop:test');
    logger.warn('careful', 1);
    logger.error('broken');

    expect(warnSpy).toHaveBeenCalledWith('careful', 1);
    expect(errorSpy).toHaveBeenCalledWith('broken');
  });

  it('does not read the logging flags when the logger is created', async () => {
    const configModule = await import('../src/config');
    const modelDataSpy = vi.spyOn(
      configModule.logging,
      'dontLogModelData',
      'get',
    );

    const loggerModule = await import('../src/logger');
    const logger = loggerModule.getLogger('agentloop:test');
    expect(modelDataSpy).not.toHaveBeenCalled();

    void logger.dontLogModelData;
    expect(modelDataSpy).toHaveBeenCalledTimes(1);
  });

  it('reads the data logging flags on every access', () => {
    const logger = getLogger('agentloop:test');
    expect(logger.dontLogModelData).toBe(false);
    expect(logger.dontLogToolData).toBe(false);

    process.env.AGENTLOOP_DONT_LOG_MODEL_DATA = 'true';
    process.env.AGENTLOOP_DONT_LOG_TOOL_DATA = '1';

    expect(logger.dontLogModelData).toBe(true);
    expect(logger.dontLogToolData).toBe(true);
  });
});
