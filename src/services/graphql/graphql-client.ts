/**
 * Minimal GraphQL-over-HTTP client. The response body is returned as-is;
 * status codes and GraphQL error envelopes are the caller's concern.
 */

import { ErrorHandler, GraphQLTransportError } from '../../infrastructure/errors/error-handler.js';
import { hashCredential, type Logger } from '../../infrastructure/logging/logger.js';
import { formatOutput } from '../tools/output-formatter.js';

export interface GraphQLRequestBody {
  query: string;
  variables?: Record<string, unknown>;
}

export type FetchFunction = typeof fetch;

export interface GraphQLClientOptions {
  logger: Logger;
  fetch?: FetchFunction;
}

export function buildRequestBody(query: string, variables: Record<string, unknown>): GraphQLRequestBody {
  if (Object.keys(variables).length === 0) {
    return { query };
  }
  return { query, variables };
}

export class GraphQLClient {
  private readonly logger: Logger;
  private readonly fetchImpl?: FetchFunction;

  constructor(options: GraphQLClientOptions) {
    this.logger = options.logger;
    this.fetchImpl = options.fetch;
  }

  async execute(
    url: string,
    query: string,
    variables: Record<string, unknown>,
    credential: string
  ): Promise<string> {
    const body = JSON.stringify(buildRequestBody(query, variables));
    const headers: Record<string, string> = {
      'Content-Type': 'application/json'
    };
    if (credential) {
      headers['Authorization'] = credential;
    }

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(
        {
          method: 'POST',
          url,
          headers: {
            ...headers,
            ...(credential ? { Authorization: `sha256:${hashCredential(credential)}` } : {})
          },
          body
        },
        'GraphQL request'
      );
    }

    const fetchImpl = this.fetchImpl ?? fetch;

    let response: Response;
    try {
      response = await fetchImpl(url, { method: 'POST', headers, body });
    } catch (error) {
      throw new GraphQLTransportError(
        `execute request: ${ErrorHandler.sanitizeErrorForLogging(error)}`,
        { cause: error }
      );
    }

    let responseBody: string;
    try {
      responseBody = await response.text();
    } catch (error) {
      throw new GraphQLTransportError(
        `read response: ${ErrorHandler.sanitizeErrorForLogging(error)}`,
        { cause: error }
      );
    }

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(
        { status: response.status, body: formatOutput(responseBody, 'json') },
        'GraphQL response'
      );
    }

    return responseBody;
  }
}
