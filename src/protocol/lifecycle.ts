/**
 * MCP Lifecycle handling
 *
 * Server state machine (uninitialized -> initializing -> ready -> shutting_down),
 * the initialize handshake with protocol version negotiation, and rejection
 * of requests that arrive before the handshake completes.
 */

import { z } from 'zod';
import {
  JsonRpcErrorCodes,
  type JsonRpcRequest,
  type JsonRpcNotification,
  type JsonRpcErrorResponse,
  createErrorResponse,
  createJsonRpcError,
} from './jsonrpc.js';

// =============================================================================
// Constants
// =============================================================================

export const PROTOCOL_VERSION = '2025-11-25' as const;

/**
 * Versions this server can speak, newest first
 */
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [
  PROTOCOL_VERSION,
  '2025-06-18',
  '2025-03-26',
  '2024-11-05',
];

// =============================================================================
// Server States
// =============================================================================

export type ServerState = 'uninitialized' | 'initializing' | 'ready' | 'shutting_down';

// =============================================================================
// Capability Types
// =============================================================================

export interface ServerCapabilities {
  tools?: {
    listChanged?: boolean;
  };
  logging?: Record<string, unknown>;
  experimental?: Record<string, unknown>;
}

// =============================================================================
// Initialize Types
// =============================================================================

export interface ImplementationInfo {
  name: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: ImplementationInfo & {
    title?: string;
  };
  instructions?: string;
}

export const ClientCapabilitiesSchema = z.object({
  roots: z.object({
    listChanged: z.boolean().optional(),
  }).optional(),
  sampling: z.record(z.unknown()).optional(),
  elicitation: z.record(z.unknown()).optional(),
  experimental: z.record(z.unknown()).optional(),
});

export const InitializeParamsSchema = z.object({
  protocolVersion: z.string(),
  capabilities: ClientCapabilitiesSchema,
  clientInfo: z.object({
    name: z.string(),
    version: z.string(),
  }),
});

export type InitializeParams = z.infer<typeof InitializeParamsSchema>;

// =============================================================================
// Server Configuration
// =============================================================================

export interface ServerConfig {
  name: string;
  version: string;
  title?: string;
  capabilities?: ServerCapabilities;
  instructions?: string;
}

/**
 * Methods a client may send before the handshake completes
 */
const ALWAYS_ALLOWED = new Set(['ping']);

// =============================================================================
// Lifecycle Manager
// =============================================================================

export class LifecycleManager {
  private state: ServerState = 'uninitialized';
  private clientInfo: ImplementationInfo | null = null;
  private negotiatedVersion: string | null = null;

  constructor(private readonly serverConfig: ServerConfig) {}

  getState(): ServerState {
    return this.state;
  }

  getClientInfo(): ImplementationInfo | null {
    return this.clientInfo;
  }

  /**
   * Protocol version agreed during initialize, null before it
   */
  getProtocolVersion(): string | null {
    return this.negotiatedVersion;
  }

  /**
   * Returns an error response if the message must be rejected in the
   * current state, null otherwise.
   */
  checkPreInitialization(
    message: JsonRpcRequest | JsonRpcNotification
  ): JsonRpcErrorResponse | null {
    const id = 'id' in message ? message.id : null;

    if (this.state === 'shutting_down') {
      return createErrorResponse(
        id,
        createJsonRpcError(JsonRpcErrorCodes.INVALID_REQUEST, 'Server is shutting down')
      );
    }

    if (this.state === 'ready' || ALWAYS_ALLOWED.has(message.method)) {
      return null;
    }

    if (message.method === 'initialize' && this.state === 'uninitialized') {
      return null;
    }

    if (message.method === 'notifications/initialized' && this.state === 'initializing') {
      return null;
    }

    return createErrorResponse(
      id,
      createJsonRpcError(
        JsonRpcErrorCodes.INVALID_REQUEST,
        'Server not initialized. Send initialize request first.'
      )
    );
  }

  /**
   * Handle the initialize request.
   *
   * A supported client version is echoed back; any other version gets the
   * newest version this server speaks, and the client decides whether to
   * continue.
   *
   * @throws LifecycleError when already initialized or params are invalid
   */
  handleInitialize(params: unknown): InitializeResult {
    if (this.state !== 'uninitialized') {
      throw new LifecycleError(JsonRpcErrorCodes.INVALID_REQUEST, 'Server already initialized');
    }

    const parseResult = InitializeParamsSchema.safeParse(params);
    if (!parseResult.success) {
      throw new LifecycleError(
        JsonRpcErrorCodes.INVALID_PARAMS,
        'Invalid initialize params',
        parseResult.error.format()
      );
    }

    const { protocolVersion, clientInfo } = parseResult.data;
    const negotiated = SUPPORTED_PROTOCOL_VERSIONS.includes(protocolVersion)
      ? protocolVersion
      : PROTOCOL_VERSION;

    this.clientInfo = clientInfo;
    this.negotiatedVersion = negotiated;
    this.state = 'initializing';

    const result: InitializeResult = {
      protocolVersion: negotiated,
      capabilities: this.serverConfig.capabilities ?? {},
      serverInfo: {
        name: this.serverConfig.name,
        version: this.serverConfig.version,
      },
    };

    if (this.serverConfig.title) {
      result.serverInfo.title = this.serverConfig.title;
    }

    if (this.serverConfig.instructions) {
      result.instructions = this.serverConfig.instructions;
    }

    return result;
  }

  /**
   * Handle the initialized notification; moves the server to ready.
   */
  handleInitialized(): void {
    if (this.state !== 'initializing') {
      throw new LifecycleError(
        JsonRpcErrorCodes.INVALID_REQUEST,
        `Cannot receive initialized notification in ${this.state} state`
      );
    }

    this.state = 'ready';
  }

  /**
   * @returns false if shutdown was already in progress
   */
  initiateShutdown(): boolean {
    if (this.state === 'shutting_down') {
      return false;
    }

    this.state = 'shutting_down';
    return true;
  }

  isOperational(): boolean {
    return this.state === 'ready';
  }

  reset(): void {
    this.state = 'uninitialized';
    this.clientInfo = null;
    this.negotiatedVersion = null;
  }
}

// =============================================================================
// Lifecycle Error
// =============================================================================

export class LifecycleError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'LifecycleError';
  }

  toJsonRpcError() {
    return createJsonRpcError(this.code, this.message, this.data);
  }
}
