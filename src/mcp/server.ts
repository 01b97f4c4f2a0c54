/**
 * MCP protocol server over the shared operation registry
 *
 * A new Server is built for every session; the registry and store it reads are
 * shared and immutable.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import type { ContentStore } from '../content/store.js';
import type { OperationRegistry } from '../operations/registry.js';
import type { McpConfig } from '../types/config.js';
import { logError } from '../utils/logger.js';
import { listResources, listResourceTemplates, readResource } from './resources.js';
import { getToolDefinitions, handleToolCall } from './tools.js';

export interface McpServerDependencies {
  registry: OperationRegistry;
  store: ContentStore;
  config: Pick<McpConfig, 'serverName' | 'serverVersion'>;
}

export function createMcpServer({ registry, store, config }: McpServerDependencies): Server {
  const server = new Server(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: getToolDefinitions(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolCall(registry, request.params.name, request.params.arguments)
  );

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
    resourceTemplates: listResourceTemplates(),
  }));

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: listResources(store),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const contents = readResource(registry, uri);
    if (!contents) {
      throw new McpError(ErrorCode.InvalidParams, `Resource not found: ${uri}`);
    }
    return { contents: [contents] };
  });

  server.onerror = (error): void => {
    logError('MCP server error', error);
  };

  return server;
}
