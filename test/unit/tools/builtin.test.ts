import { describe, it, expect } from 'vitest';
import { registerDiceTools } from '../../../src/tools/builtin.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { DiceEngine } from '../../../src/dice/engine.js';

describe('registerDiceTools', () => {
  it('should register the four dice tools in order', () => {
    const registry = new ToolRegistry();
    registerDiceTools(registry, new DiceEngine());

    expect(registry.getAllTools().map((tool) => tool.name)).toEqual([
      'roll',
      'roll_detailed',
      'roll_batch',
      'validate_syntax',
    ]);
  });

  it('should apply the batch size option', () => {
    const registry = new ToolRegistry();
    registerDiceTools(registry, new DiceEngine(), { maxBatchSize: 7 });

    expect(registry.getTool('roll_batch')?.inputSchema.properties?.['expressions']?.maxItems).toBe(7);
  });

  it('should refuse to register twice', () => {
    const registry = new ToolRegistry();
    registerDiceTools(registry, new DiceEngine());
    expect(() => registerDiceTools(registry, new DiceEngine())).toThrow('Tool already registered: roll');
  });
});
