/**
 * MCP über JSON-RPC 2.0 (minimal): initialize, tools/list, tools/call, ping
 */

import { ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { InvalidParamsError, JobSchemaError, errorMessage } from '../utils/errors.js';
import { isoSeconds } from '../utils/time.js';
import { isPlainObject } from '../jobs/schema.js';
import { SERVICE_NAME, findTool, toolSpecs, type ToolDeps } from './tools.js';

export const PROTOCOL_VERSION = '2024-11-05';

export const RPC_PARSE_ERROR = -32700;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_SERVER_ERROR = -32000;

export type RpcId = string | number | null;

export interface RpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface RpcResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result?: unknown;
  error?: RpcError;
}

export function rpcResult(id: RpcId, result: unknown): RpcResponse {
  return { jsonrpc: '2.0', id, result };
}

export function rpcError(id: RpcId, code: number, message: string, data?: unknown): RpcResponse {
  const error: RpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: '2.0', id, error };
}

function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isInvalidParams(err: unknown): boolean {
  return err instanceof InvalidParamsError || err instanceof JobSchemaError || err instanceof ZodError;
}

export async function handleRpc(payload: unknown, deps: ToolDeps): Promise<RpcResponse> {
  const body = isPlainObject(payload) ? payload : {};
  const id: RpcId = typeof body.id === 'string' || typeof body.id === 'number' ? body.id : null;
  const method = typeof body.method === 'string' ? body.method : '';
  const params = isPlainObject(body.params) ? body.params : {};
  const now = (): string => isoSeconds(deps.now ? deps.now() : new Date());

  try {
    switch (method) {
      case 'initialize':
        return rpcResult(id, {
          protocolVersion: PROTOCOL_VERSION,
          serverInfo: { name: SERVICE_NAME, version: deps.appVersion },
          capabilities: { tools: {} },
        });

      case 'tools/list':
        return rpcResult(id, { tools: toolSpecs() });

      case 'tools/call': {
        const name = typeof params.name === 'string' ? params.name.trim() : '';
        if (!name) {
          return rpcError(id, RPC_INVALID_PARAMS, 'Missing params.name');
        }
        const tool = findTool(name);
        if (!tool) {
          throw new InvalidParamsError(`Unknown tool: ${name}`);
        }

        const text = await tool.call(params.arguments ?? {}, deps);
        return rpcResult(id, { content: [{ type: 'text', text }] });
      }

      case 'ping':
        return rpcResult(id, { ok: true, ts: now() });

      default:
        return rpcError(id, RPC_METHOD_NOT_FOUND, `Method not found: ${method}`);
    }
  } catch (err) {
    if (isInvalidParams(err)) {
      const detail = err instanceof ZodError ? formatZodError(err) : errorMessage(err);
      logger.warn(`MCP ${method}: ungültige Parameter: ${detail}`);
      return rpcError(id, RPC_INVALID_PARAMS, 'Invalid params', detail);
    }

    logger.error(`MCP ${method} fehlgeschlagen: ${errorMessage(err)}`);
    return rpcError(id, RPC_SERVER_ERROR, 'Server error', errorMessage(err));
  }
}
