/**
 * Error taxonomy for the forge server and conversion into tool results
 */

import type { ToolResponse } from '../../types/mcp.js';

export class ForgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ForgeError';
  }
}

/**
 * Startup-fatal: the server cannot run without a valid settings document.
 */
export class ConfigurationError extends ForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

export class ToolDefinitionError extends ForgeError {
  constructor(
    message: string,
    public readonly file: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'TOOL_DEFINITION_ERROR', options);
    this.name = 'ToolDefinitionError';
  }
}

export class MissingArgumentError extends ForgeError {
  constructor(public readonly argument: string) {
    super(`missing required argument: ${argument}`, 'MISSING_ARGUMENT');
    this.name = 'MissingArgumentError';
  }
}

export class TokenCommandError extends ForgeError {
  constructor(
    message: string,
    public readonly stderr: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'TOKEN_COMMAND_ERROR', options);
    this.name = 'TokenCommandError';
  }
}

export class GraphQLTransportError extends ForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'GRAPHQL_TRANSPORT_ERROR', options);
    this.name = 'GraphQLTransportError';
  }
}

export class ErrorHandler {
  static handleError(error: unknown): ForgeError {
    if (error instanceof ForgeError) {
      return error;
    }

    if (error instanceof Error) {
      return new ForgeError(
        `Unexpected error: ${error.message}`,
        'INTERNAL_ERROR',
        { cause: error }
      );
    }

    return new ForgeError('An unknown error occurred', 'UNKNOWN_ERROR', { cause: error });
  }

  static createToolResponse(error: ForgeError): ToolResponse {
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${error.message}`
        }
      ],
      isError: true
    };
  }

  static sanitizeErrorForLogging(error: unknown): string {
    if (error instanceof Error) {
      return `${error.name}: ${error.message}`;
    }
    return String(error);
  }
}
