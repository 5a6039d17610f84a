import { describe, it, expect, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { ConfigSchema, getConfig, loadConfig, reloadConfig, resetConfig } from '../../src/config.js';

describe('Config', () => {
  afterEach(() => {
    resetConfig();
    delete process.env['DICE_MAX_DICE'];
  });

  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      pageSize: 50,
      requestTimeoutMs: 30000,
      shutdownTimeoutMs: 10000,
      debug: false,
      logLevel: 'info',
      maxDice: 1000,
      maxRerolls: 1000,
      maxBatchSize: 100,
    });
  });

  it('should read every variable', () => {
    expect(
      loadConfig({
        MCP_PAGE_SIZE: '10',
        MCP_REQUEST_TIMEOUT_MS: '500',
        MCP_SHUTDOWN_TIMEOUT_MS: '0',
        MCP_DEBUG: 'true',
        MCP_LOG_LEVEL: 'debug',
        DICE_MAX_DICE: '50',
        DICE_MAX_REROLLS: '20',
        DICE_MAX_BATCH_SIZE: '5',
        DICE_SEED: 'test-seed',
      })
    ).toEqual({
      pageSize: 10,
      requestTimeoutMs: 500,
      shutdownTimeoutMs: 0,
      debug: true,
      logLevel: 'debug',
      maxDice: 50,
      maxRerolls: 20,
      maxBatchSize: 5,
      seed: 'test-seed',
    });
  });

  it('should accept 1 as true', () => {
    expect(loadConfig({ MCP_DEBUG: '1' }).debug).toBe(true);
    expect(loadConfig({ MCP_DEBUG: 'no' }).debug).toBe(false);
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ DICE_MAX_DICE: '', DICE_SEED: '' })).not.toHaveProperty('seed');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ DICE_MAX_DICE: 'lots' })).toThrow(ZodError);
    expect(() => loadConfig({ DICE_MAX_BATCH_SIZE: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ MCP_LOG_LEVEL: 'loud' })).toThrow(ZodError);
    expect(() => loadConfig({ MCP_PAGE_SIZE: '1.5' })).toThrow(ZodError);
  });

  it('should cache the process configuration', () => {
    process.env['DICE_MAX_DICE'] = '10';
    expect(getConfig().maxDice).toBe(10);

    process.env['DICE_MAX_DICE'] = '20';
    expect(getConfig().maxDice).toBe(10);
    expect(reloadConfig().maxDice).toBe(20);
  });

  it('should expose the schema defaults', () => {
    expect(ConfigSchema.parse({}).maxBatchSize).toBe(100);
  });
});
