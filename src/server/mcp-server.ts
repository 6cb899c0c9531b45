/**
 * MCP server exposing the registered GraphQL tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';

import { ErrorHandler, ForgeError } from '../infrastructure/errors/error-handler.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { TokenProvider, parseAuthorizationHeader } from '../services/auth/token-provider.js';
import { GraphQLClient, type FetchFunction } from '../services/graphql/graphql-client.js';
import { ToolRegistrar } from '../services/tools/tool-registrar.js';
import { ToolRegistry } from '../services/tools/tool-registry.js';
import type { ServerSettings, ToolDefinition } from '../types/config.js';
import type { InvocationContext, ToolResponse } from '../types/mcp.js';

export interface ForgeMcpServerOptions {
  settings: ServerSettings;
  definitions: readonly ToolDefinition[];
  logger: Logger;
  fetch?: FetchFunction;
}

export class ForgeMcpServer {
  private readonly settings: ServerSettings;
  private readonly logger: Logger;
  private readonly registry = new ToolRegistry();

  constructor(options: ForgeMcpServerOptions) {
    this.settings = options.settings;
    this.logger = options.logger;

    const tokenProvider = new TokenProvider(this.settings, this.logger);
    const graphqlClient = new GraphQLClient({ logger: this.logger, fetch: options.fetch });
    const registrar = new ToolRegistrar(this.settings, tokenProvider, graphqlClient, this.logger);

    const registered = registrar.registerAll(this.registry, options.definitions);
    this.logger.info(
      { registered, skipped: options.definitions.length - registered },
      `Registered ${registered} tools`
    );
  }

  /**
   * A fresh protocol server bound to the shared registry. The SDK allows one
   * transport per server, so HTTP mode creates one per session.
   */
  createServer(): Server {
    const server = new Server(
      {
        name: this.settings.name,
        version: this.settings.version
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.registry.getListings() };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {}, parseAuthorizationHeader(extra.authInfo?.token));
    });

    return server;
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    context: InvocationContext
  ): Promise<ToolResponse> {
    const tool = this.registry.getTool(name);
    if (!tool) {
      return ErrorHandler.createToolResponse(new ForgeError(`Unknown tool: ${name}`, 'UNKNOWN_TOOL'));
    }

    try {
      return await tool.handler(args, context);
    } catch (error) {
      this.logger.error(
        { tool: name },
        `Tool execution error: ${ErrorHandler.sanitizeErrorForLogging(error)}`
      );
      return ErrorHandler.createToolResponse(ErrorHandler.handleError(error));
    }
  }

  getToolNames(): string[] {
    return this.registry.getToolNames();
  }
}
