#!/usr/bin/env -S npx tsx
/**
 * searchrelay MCP Server
 *
 * Exposes web search as an MCP (Model Context Protocol) tool over stdio, one
 * JSON-RPC message per line.
 */

import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { type SearchEnvelope, validateSearchRequest, webSearch } from "./src/app/index";
import { createLogger } from "./src/core/logger";

const log = createLogger("MCP");

const SEARCH_TIMEOUT_MS = 120_000;

const MCPRequestSchema = z.object({
  jsonrpc: z.string(),
  id: z.union([z.number(), z.string()]).optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

const MCPToolCallParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).default({}),
});

type MCPRequest = z.infer<typeof MCPRequestSchema>;

interface MCPTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

interface MCPResponse {
  jsonrpc: "2.0";
  id?: number | string;
  result?: unknown;
  error?: {
    code?: number;
    message: string;
  };
}

export const tools: MCPTool[] = [
  {
    name: "web_search",
    description:
      "Web search through SearXNG with smart engine selection, retries with alternate engines, and optional page content",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Search query",
        },
        max_results: {
          type: "number",
          description: "Maximum number of results (1-100)",
          default: 10,
        },
        include_raw_content: {
          type: "boolean",
          description: "Fetch the content of each result page",
          default: false,
        },
        content_format: {
          type: "string",
          enum: ["text", "markdown"],
          description: "Format of fetched page content",
          default: "markdown",
        },
        engines: {
          type: "string",
          description: "Comma-separated engines to use (e.g. 'google,wikipedia'); disables smart selection",
        },
      },
      required: ["query"],
    },
  },
];

// Helper function with timeout; the signal cancels the abandoned search
async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  operation: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`${operation} timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([run(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

async function callTool(params: unknown): Promise<SearchEnvelope> {
  const { name, arguments: args } = MCPToolCallParamsSchema.parse(params);
  if (name !== "web_search") {
    throw new Error(`Unknown tool: ${name}`);
  }
  const input = validateSearchRequest(args);
  return withTimeout((signal) => webSearch(input, { signal }), SEARCH_TIMEOUT_MS, "web_search");
}

/**
 * Answer one request; notifications get no response
 */
export async function handleRequest(request: MCPRequest): Promise<MCPResponse | undefined> {
  // Handle initialize request - required by MCP protocol
  if (request.method === "initialize") {
    return {
      jsonrpc: "2.0",
      id: request.id,
      result: {
        protocolVersion: "2024-11-05",
        capabilities: {
          tools: {},
        },
        serverInfo: {
          name: "searchrelay",
          version: "1.0.0",
        },
      },
    };
  }

  // Handle initialized notification (no response needed)
  if (request.method === "notifications/initialized" || request.method === "initialized") {
    return undefined;
  }

  if (request.method === "tools/list") {
    return { jsonrpc: "2.0", id: request.id, result: { tools } };
  }

  if (request.method === "tools/call") {
    try {
      const result = await callTool(request.params);
      return {
        jsonrpc: "2.0",
        id: request.id,
        result: {
          content: [
            {
              type: "text",
              text: JSON.stringify(result, null, 2),
            },
          ],
        },
      };
    } catch (error) {
      return {
        jsonrpc: "2.0",
        id: request.id,
        error: {
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  return {
    jsonrpc: "2.0",
    id: request.id,
    error: { code: -32601, message: `Method not found: ${request.method}` },
  };
}

// MCP Server entry point
export async function serve(): Promise<void> {
  const readline = createInterface({
    input: process.stdin,
    terminal: false,
  });

  for await (const line of readline) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      log.debug(`Ignoring malformed line: ${line.slice(0, 80)}`);
      continue;
    }

    const request = MCPRequestSchema.safeParse(parsed);
    if (!request.success) {
      log.debug("Ignoring message that is not a JSON-RPC request");
      continue;
    }

    const response = await handleRequest(request.data);
    if (response) {
      process.stdout.write(`${JSON.stringify(response)}\n`);
    }
  }
}

// Auto-start if run directly
if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  await serve();
}
