/**
 * Turns tool definitions into MCP tool listings plus call handlers
 */

import {
  ErrorHandler,
  MissingArgumentError
} from '../../infrastructure/errors/error-handler.js';
import type { Logger } from '../../infrastructure/logging/logger.js';
import {
  SUPPORTED_INPUT_TYPES,
  type InputSpec,
  type ServerSettings,
  type SupportedInputType,
  type ToolDefinition
} from '../../types/config.js';
import type {
  InvocationContext,
  RegisteredTool,
  ToolHandler,
  ToolListing,
  ToolResponse
} from '../../types/mcp.js';
import type { TokenProvider } from '../auth/token-provider.js';
import type { GraphQLClient } from '../graphql/graphql-client.js';
import { formatOutput } from './output-formatter.js';
import type { ToolRegistry } from './tool-registry.js';

export function isSupportedInputType(type: string): type is SupportedInputType {
  return SUPPORTED_INPUT_TYPES.some(supported => supported === type);
}

/**
 * Binds every declared input to a GraphQL variable. Optional inputs the
 * caller left out are bound to null; values are passed through unchanged.
 */
export function collectVariables(
  inputs: readonly InputSpec[],
  args: Record<string, unknown>
): Record<string, unknown> {
  const variables: Record<string, unknown> = {};
  for (const input of inputs) {
    if (!Object.hasOwn(args, input.name)) {
      if (input.required) {
        throw new MissingArgumentError(input.name);
      }
      variables[input.name] = null;
      continue;
    }
    variables[input.name] = args[input.name];
  }
  return variables;
}

export function buildToolListing(definition: ToolDefinition): ToolListing {
  const properties: Record<string, { type: SupportedInputType; description: string }> = {};
  const required: string[] = [];

  for (const input of definition.inputs) {
    if (!isSupportedInputType(input.type)) {
      throw new Error(`unsupported input type "${input.type}" in tool ${definition.name}`);
    }
    properties[input.name] = { type: input.type, description: input.description };
    if (input.required) {
      required.push(input.name);
    }
  }

  const listing: ToolListing = {
    name: definition.name,
    description: definition.description,
    inputSchema: {
      type: 'object',
      properties,
      ...(required.length > 0 ? { required } : {})
    }
  };

  if (definition.annotations) {
    listing.annotations = { ...definition.annotations };
  }

  return listing;
}

export class ToolRegistrar {
  constructor(
    private readonly settings: ServerSettings,
    private readonly tokenProvider: TokenProvider,
    private readonly graphqlClient: GraphQLClient,
    private readonly logger: Logger
  ) {}

  /**
   * Registers the tool unless one of its inputs has an unsupported type or
   * its name is taken. Returns whether it was registered.
   */
  register(registry: ToolRegistry, definition: ToolDefinition): boolean {
    const unsupported = definition.inputs.find(input => !isSupportedInputType(input.type));
    if (unsupported) {
      this.logger.warn(
        { tool: definition.name, type: unsupported.type, file: definition.sourceFile },
        `Unsupported input type "${unsupported.type}" in tool ${definition.name}, skipping`
      );
      return false;
    }

    if (registry.has(definition.name)) {
      this.logger.warn(
        { tool: definition.name, file: definition.sourceFile },
        `Duplicate tool name ${definition.name}, skipping`
      );
      return false;
    }

    const tool: RegisteredTool = {
      listing: buildToolListing(definition),
      handler: this.createHandler(definition)
    };
    registry.add(tool);
    this.logger.debug({ tool: definition.name, file: definition.sourceFile }, 'Registered tool');
    return true;
  }

  registerAll(registry: ToolRegistry, definitions: readonly ToolDefinition[]): number {
    let registered = 0;
    for (const definition of definitions) {
      if (this.register(registry, definition)) {
        registered++;
      }
    }
    return registered;
  }

  createHandler(definition: ToolDefinition): ToolHandler {
    return async (args: Record<string, unknown>, context: InvocationContext): Promise<ToolResponse> => {
      try {
        const variables = collectVariables(definition.inputs, args);
        const credential = await this.tokenProvider.resolve(context);
        const body = await this.graphqlClient.execute(this.settings.url, definition.query, variables, credential);

        return {
          content: [{ type: 'text', text: formatOutput(body, definition.output) }]
        };
      } catch (error) {
        const forgeError = ErrorHandler.handleError(error);
        this.logger.warn(
          { tool: definition.name, code: forgeError.code },
          `Tool call failed: ${ErrorHandler.sanitizeErrorForLogging(forgeError)}`
        );
        return ErrorHandler.createToolResponse(forgeError);
      }
    };
  }
}
