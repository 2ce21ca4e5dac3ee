#!/usr/bin/env node

import './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall } from './tools/index.js';
import { runDdlCli } from './copybook/cli.js';
import { SERVER_NAME } from './constants.js';
import { getPackageVersion, resolveToolMode } from './shared/index.js';

const TOOL_MODE = resolveToolMode();

const server = new Server(
  {
    name: SERVER_NAME,
    version: getPackageVersion(),
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: getTools(TOOL_MODE) };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  return handleToolCall(request.params.name, request.params.arguments ?? {}, TOOL_MODE);
});

interface SimpleJsonRpcRequest {
  jsonrpc?: string;
  id?: string | number | null;
  method?: string;
  params?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function simpleJsonRpcResult(
  id: string | number | null | undefined,
  result: unknown,
): Record<string, unknown> {
  return {
    jsonrpc: '2.0',
    id: id ?? null,
    result,
  };
}

function simpleJsonRpcError(
  id: string | number | null | undefined,
  code: number,
  message: string,
): Record<string, unknown> {
  return {
    jsonrpc: '2.0',
    id: id ?? null,
    error: { code, message },
  };
}

function toSimpleRequest(value: Record<string, unknown>): SimpleJsonRpcRequest {
  const { jsonrpc, id, method, params } = value;
  return {
    jsonrpc: typeof jsonrpc === 'string' ? jsonrpc : undefined,
    id: typeof id === 'string' || typeof id === 'number' ? id : null,
    method: typeof method === 'string' ? method : undefined,
    params: isRecord(params) ? params : undefined,
  };
}

export async function handleSimpleJsonRpcRequest(request: SimpleJsonRpcRequest): Promise<Record<string, unknown>> {
  if (request.method === 'tools/list') {
    return simpleJsonRpcResult(request.id, { tools: getTools(TOOL_MODE) });
  }

  if (request.method === 'tools/call') {
    const params = request.params ?? {};
    const name = typeof params.name === 'string' ? params.name : '';
    const args = isRecord(params.arguments) ? params.arguments : {};
    if (name.length === 0) {
      return simpleJsonRpcError(request.id, -32602, 'Invalid params: tools/call requires name');
    }
    const response = await handleToolCall(name, args, TOOL_MODE);
    return simpleJsonRpcResult(request.id, response);
  }

  return simpleJsonRpcError(request.id, -32601, `Method not found: ${request.method ?? '(missing)'}`);
}

/** Only stdin that opens with an object is taken as a one-shot request; anything else goes to the MCP transport. */
export function looksLikeJsonRpc(firstText: string): boolean {
  return firstText.trimStart().startsWith('{');
}

export async function respondToSimpleJsonRpcPayload(payload: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.trim());
  } catch {
    return simpleJsonRpcError(null, -32700, 'Parse error');
  }
  if (!isRecord(parsed)) {
    return simpleJsonRpcError(null, -32600, 'Invalid Request');
  }
  return handleSimpleJsonRpcRequest(toSimpleRequest(parsed));
}

// Piped stdin holding a single JSON-RPC object gets one answer, then the process exits.
async function maybeServeSimpleJsonRpcOnce(): Promise<boolean> {
  if (process.stdin.isTTY) return false;

  const firstChunk = await new Promise<Buffer | null>((resolve) => {
    let settled = false;
    const onData = (chunk: string | Buffer): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    };
    const onEnd = (): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(null);
    };
    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(Buffer.alloc(0));
    }, 30);
    const cleanup = (): void => {
      clearTimeout(timer);
      process.stdin.off('data', onData);
      process.stdin.off('end', onEnd);
    };

    process.stdin.on('data', onData);
    process.stdin.on('end', onEnd);
    process.stdin.resume();
  });

  if (firstChunk === null || firstChunk.length === 0) {
    return false;
  }

  const firstText = firstChunk.toString('utf-8');
  if (!looksLikeJsonRpc(firstText)) {
    process.stdin.unshift(firstChunk);
    return false;
  }

  let payload = firstText;
  for await (const chunk of process.stdin) {
    payload += (typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8'));
  }

  const response = await respondToSimpleJsonRpcPayload(payload);
  process.stdout.write(`${JSON.stringify(response)}\n`);
  return true;
}

async function main() {
  if (process.argv[2] === 'ddl') {
    await runDdlCli(process.argv.slice(3));
    return;
  }

  if (await maybeServeSimpleJsonRpcOnce()) {
    console.error('[copybook-mcp] Served one-shot simple JSON-RPC request');
    return;
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[copybook-mcp] Server started (${TOOL_MODE} tools)`);
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    console.error('[copybook-mcp] Fatal:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
