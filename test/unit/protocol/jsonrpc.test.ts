import { describe, it, expect } from 'vitest';
import {
  JsonRpcErrorCodes,
  createErrorResponse,
  createJsonRpcError,
  createMethodNotFoundResponse,
  createNotification,
  createRequest,
  createSuccessResponse,
  isRequest,
  parseJsonRpc,
  serializeMessage,
} from '../../../src/protocol/jsonrpc.js';

describe('JSON-RPC', () => {
  // =============================================================================
  // Parsing
  // =============================================================================
  describe('parseJsonRpc', () => {
    it('should parse a request', () => {
      expect(parseJsonRpc('{"jsonrpc":"2.0","id":1,"method":"tools/list","params":{"cursor":"x"}}')).toEqual({
        success: true,
        data: { jsonrpc: '2.0', id: 1, method: 'tools/list', params: { cursor: 'x' } },
      });
    });

    it('should parse a notification', () => {
      expect(parseJsonRpc('{"jsonrpc":"2.0","method":"notifications/initialized"}')).toEqual({
        success: true,
        data: { jsonrpc: '2.0', method: 'notifications/initialized' },
      });
    });

    it('should report invalid JSON as a parse error', () => {
      const result = parseJsonRpc('{not json');
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(JsonRpcErrorCodes.PARSE_ERROR);
      expect(result.error.message).toBe('Parse error: Invalid JSON');
      expect(result).not.toHaveProperty('id');
    });

    it('should reject non-object messages', () => {
      expect(parseJsonRpc('[1, 2]')).toEqual({
        success: false,
        error: { code: -32600, message: 'Invalid Request: Expected object' },
      });
    });

    it('should reject the wrong version and keep the id', () => {
      expect(parseJsonRpc('{"jsonrpc":"1.0","id":7,"method":"ping"}')).toEqual({
        success: false,
        id: 7,
        error: {
          code: -32600,
          message: 'Invalid Request: jsonrpc must be "2.0"',
          data: { received: '1.0' },
        },
      });
    });

    it('should reject a non-string method', () => {
      expect(parseJsonRpc('{"jsonrpc":"2.0","id":"a","method":5}')).toEqual({
        success: false,
        id: 'a',
        error: { code: -32600, message: 'Invalid Request: method must be a string' },
      });
    });

    it('should reject params that are not an object', () => {
      expect(parseJsonRpc('{"jsonrpc":"2.0","id":3,"method":"ping","params":[1]}')).toEqual({
        success: false,
        id: 3,
        error: { code: -32602, message: 'Invalid params: must be an object' },
      });
    });

    it('should reject null and fractional ids', () => {
      for (const id of ['null', '1.5']) {
        expect(parseJsonRpc(`{"jsonrpc":"2.0","id":${id},"method":"ping"}`)).toEqual({
          success: false,
          id: null,
          error: { code: -32600, message: 'Invalid Request: id must be a string or integer' },
        });
      }
    });
  });

  // =============================================================================
  // Factories
  // =============================================================================
  describe('factories', () => {
    it('should omit absent params', () => {
      expect(createRequest(1, 'ping')).toEqual({ jsonrpc: '2.0', id: 1, method: 'ping' });
      expect(createNotification('notifications/message', { level: 'info' })).toEqual({
        jsonrpc: '2.0',
        method: 'notifications/message',
        params: { level: 'info' },
      });
    });

    it('should build responses', () => {
      expect(createSuccessResponse(1, {})).toEqual({ jsonrpc: '2.0', id: 1, result: {} });
      expect(createErrorResponse(null, createJsonRpcError(-32603, 'boom'))).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32603, message: 'boom' },
      });
    });

    it('should name the missing method', () => {
      expect(createMethodNotFoundResponse(4, 'resources/list')).toEqual({
        jsonrpc: '2.0',
        id: 4,
        error: { code: -32601, message: 'Method not found', data: { method: 'resources/list' } },
      });
    });

    it('should serialize to a single line', () => {
      expect(serializeMessage(createRequest('a', 'ping'))).toBe('{"jsonrpc":"2.0","id":"a","method":"ping"}');
    });
  });

  // =============================================================================
  // Type Guards
  // =============================================================================
  describe('type guards', () => {
    it('should tell messages apart', () => {
      const request = createRequest(1, 'ping');
      const notification = createNotification('notifications/initialized');
      const error = createErrorResponse(1, createJsonRpcError(-32600, 'bad'));

      expect(isRequest(request)).toBe(true);
      expect(isRequest(notification)).toBe(false);
      expect(isRequest(error)).toBe(false);
    });
  });
});
