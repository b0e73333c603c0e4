/**
 * MCP Server
 *
 * JSON-RPC 2.0 over newline-delimited stdio. Each line is one message;
 * requests are handled concurrently and answered in completion order.
 * Stdout carries protocol messages only.
 */

import { z } from 'zod';
import { describeError } from './errors.js';
import { Logger, logger as defaultLogger } from './logger.js';
import { toJsonText } from './tools/format.js';
import type { Tool } from './tools/registry.js';
import type { MCPError, MCPRequest, MCPResponse, MCPToolResult } from './types.js';

export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

type RequestId = string | number;

// Returned by a handler whose request must go unanswered
const NO_RESPONSE = Symbol('no-response');

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]).optional(),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

const callParamsSchema = z.object({
  name: z.string({ required_error: 'tool name is required' }).min(1, 'tool name is required'),
  arguments: z
    .record(z.unknown(), { invalid_type_error: 'tool arguments must be an object' })
    .optional(),
});

const cancelParamsSchema = z.object({
  requestId: z.union([z.string(), z.number()]),
  reason: z.string().optional(),
});

export interface MCPServerOptions {
  name?: string;
  version?: string;
  logger?: Logger;
}

class ProtocolError extends Error {
  constructor(
    public readonly code: number,
    message: string
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class MCPServer {
  private readonly tools = new Map<string, Tool>();
  private readonly inFlight = new Map<RequestId, AbortController>();
  private readonly logger: Logger;
  private readonly name: string;
  private readonly version: string;

  constructor(tools: readonly Tool[], options: MCPServerOptions = {}) {
    for (const tool of tools) {
      this.tools.set(tool.definition.name, tool);
    }
    this.logger = options.logger ?? defaultLogger;
    this.name = options.name ?? 'sql-gatekeeper';
    this.version = options.version ?? '1.0.0';
  }

  /**
   * Reads requests from `input` until it ends, writing responses to
   * `output`. Resolves once every request already read has been answered.
   */
  listen(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<void> {
    input.setEncoding('utf8');

    return new Promise<void>((resolve, reject) => {
      let buffer = '';
      const handling = new Set<Promise<void>>();

      const dispatch = (line: string): void => {
        const task: Promise<void> = this.handleLine(line)
          .then(response => {
            if (response) {
              output.write(`${JSON.stringify(response)}\n`);
            }
          })
          .catch((error: unknown) => {
            this.logger.error('Failed to write response', error);
          })
          .finally(() => {
            handling.delete(task);
          });
        handling.add(task);
      };

      input.on('data', (chunk: string | Buffer) => {
        buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');

        let newlineIndex;
        while ((newlineIndex = buffer.indexOf('\n')) !== -1) {
          const line = buffer.slice(0, newlineIndex).trim();
          buffer = buffer.slice(newlineIndex + 1);

          if (line) {
            dispatch(line);
          }
        }
      });

      input.on('end', () => {
        const rest = buffer.trim();
        buffer = '';
        if (rest) {
          dispatch(rest);
        }
        Promise.all(handling).then(() => resolve(), reject);
      });

      input.on('error', reject);
    });
  }

  /**
   * Handles one raw line. Returns null for notifications.
   */
  async handleLine(line: string): Promise<MCPResponse | null> {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (error) {
      return errorResponse(null, ErrorCodes.PARSE_ERROR, `Parse error: ${describeError(error)}`);
    }

    const parsed = requestSchema.safeParse(message);
    if (!parsed.success) {
      return errorResponse(null, ErrorCodes.INVALID_REQUEST, 'Invalid Request');
    }

    return this.handleRequest(parsed.data);
  }

  async handleRequest(request: MCPRequest): Promise<MCPResponse | null> {
    if (request.id === undefined) {
      this.handleNotification(request);
      return null;
    }

    const id = request.id;
    try {
      const result = await this.dispatch(id, request);
      if (result === NO_RESPONSE) {
        return null;
      }
      return { jsonrpc: '2.0', id, result };
    } catch (error) {
      if (error instanceof ProtocolError) {
        return errorResponse(id, error.code, error.message);
      }
      this.logger.error('Request failed', error, { method: request.method });
      return errorResponse(id, ErrorCodes.INTERNAL_ERROR, `Internal error: ${describeError(error)}`);
    }
  }

  /**
   * Aborts every tool call still running.
   */
  cancelAll(): void {
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
  }

  private async dispatch(id: RequestId, request: MCPRequest): Promise<unknown> {
    const params = request.params ?? {};

    switch (request.method) {
      case 'initialize':
        return this.initialize(params);

      case 'ping':
        return {};

      case 'tools/list':
        return { tools: Array.from(this.tools.values(), tool => tool.definition) };

      case 'tools/call':
        return this.callTool(id, params);

      default:
        throw new ProtocolError(ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }
  }

  private initialize(params: Record<string, unknown>) {
    const requested = params['protocolVersion'];
    return {
      protocolVersion: typeof requested === 'string' ? requested : DEFAULT_PROTOCOL_VERSION,
      capabilities: { tools: {} },
      serverInfo: { name: this.name, version: this.version },
    };
  }

  /**
   * Runs a tool. A call cancelled by the client gets no response at all,
   * whatever the tool ended with.
   */
  private async callTool(
    id: RequestId,
    params: Record<string, unknown>
  ): Promise<MCPToolResult | typeof NO_RESPONSE> {
    const parsed = callParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ProtocolError(
        ErrorCodes.INVALID_PARAMS,
        parsed.error.issues[0]?.message ?? 'invalid params'
      );
    }

    const { name, arguments: args = {} } = parsed.data;
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ProtocolError(ErrorCodes.INVALID_PARAMS, `Unknown tool: ${name}`);
    }

    const controller = new AbortController();
    this.inFlight.set(id, controller);

    try {
      const result = await tool.run(args, { signal: controller.signal });
      if (controller.signal.aborted) {
        this.logger.info('Dropping response to cancelled request', {
          requestId: id,
          tool: name,
          outcome: 'completed',
        });
        return NO_RESPONSE;
      }
      return { content: [{ type: 'text', text: toJsonText(result) }] };
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.info('Dropping response to cancelled request', {
          requestId: id,
          tool: name,
          outcome: describeError(error),
        });
        return NO_RESPONSE;
      }
      this.logger.debug('Tool call failed', { tool: name, error: describeError(error) });
      return { content: [{ type: 'text', text: describeError(error) }], isError: true };
    } finally {
      if (this.inFlight.get(id) === controller) {
        this.inFlight.delete(id);
      }
    }
  }

  private handleNotification(request: MCPRequest): void {
    if (request.method !== 'notifications/cancelled') {
      this.logger.debug('Notification ignored', { method: request.method });
      return;
    }

    const parsed = cancelParamsSchema.safeParse(request.params ?? {});
    if (!parsed.success) {
      this.logger.warn('Malformed cancellation', { params: request.params });
      return;
    }

    const controller = this.inFlight.get(parsed.data.requestId);
    if (controller) {
      this.logger.info('Cancelling request', {
        requestId: parsed.data.requestId,
        reason: parsed.data.reason,
      });
      controller.abort();
    }
  }
}

function errorResponse(id: RequestId | null, code: number, message: string): MCPResponse {
  const error: MCPError = { code, message };
  return { jsonrpc: '2.0', id, error };
}
