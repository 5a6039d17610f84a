import { describe, it, expect } from 'vitest';
import { getDefaultServerCapabilities } from '../../../src/protocol/capabilities.js';

describe('getDefaultServerCapabilities', () => {
  it('should offer tools without list changes and logging', () => {
    expect(getDefaultServerCapabilities()).toEqual({
      tools: { listChanged: false },
      logging: {},
    });
  });

  it('should return a fresh object each time', () => {
    expect(getDefaultServerCapabilities()).not.toBe(getDefaultServerCapabilities());
  });
});
