import { describe, it, expect } from 'vitest';
import {
  InternalError,
  InvalidParamsError,
  McpError,
  createToolErrorResult,
  createToolJsonResult,
  fromError,
  toErrorResponse,
} from '../../../src/protocol/errors.js';

describe('MCP errors', () => {
  // =============================================================================
  // Error classes
  // =============================================================================
  describe('McpError', () => {
    it('should serialize without a stack', () => {
      expect(new McpError(-32000, 'custom', { a: 1 }).toJSON()).toEqual({
        code: -32000,
        message: 'custom',
        data: { a: 1 },
      });
      expect(new InvalidParamsError().toJSON()).toEqual({ code: -32602, message: 'Invalid params' });
    });

  });

  describe('fromError', () => {
    it('should keep McpErrors', () => {
      const error = new InvalidParamsError('bad');
      expect(fromError(error)).toBe(error);
    });

    it('should wrap other errors as internal errors', () => {
      expect(fromError(new Error('disk full')).message).toBe('An internal error occurred: disk full');
      expect(fromError('oops').message).toBe('An internal error occurred: oops');
      expect(fromError(42)).toBeInstanceOf(InternalError);
      expect(fromError(42).message).toBe('An unexpected internal error occurred');
    });
  });

  it('should build error responses', () => {
    expect(toErrorResponse(new InvalidParamsError('bad'), 5)).toEqual({
      jsonrpc: '2.0',
      id: 5,
      error: { code: -32602, message: 'bad' },
    });
    expect(toErrorResponse(fromError(new Error('x')), 'r1')).toEqual({
      jsonrpc: '2.0',
      id: 'r1',
      error: { code: -32603, message: 'An internal error occurred: x' },
    });
  });

  // =============================================================================
  // Tool results
  // =============================================================================
  describe('tool results', () => {
    it('should prefix the tool name and append details', () => {
      expect(createToolErrorResult('failed hard', 'roll', { reason: 'x' })).toEqual({
        content: [{ type: 'text', text: 'Tool \'roll\' failed: failed hard\n\nDetails: {\n  "reason": "x"\n}' }],
        isError: true,
      });
    });

    it('should pass string details through', () => {
      expect(createToolErrorResult('failed', undefined, 'more').content[0]?.text).toBe('failed\n\nDetails: more');
    });

    it('should carry JSON payloads as text and structured content', () => {
      expect(createToolJsonResult({ total: 3 })).toEqual({
        content: [{ type: 'text', text: '{"total":3}' }],
        structuredContent: { total: 3 },
      });
      expect(createToolJsonResult({ error: 'x' }, true).isError).toBe(true);
    });
  });
});
