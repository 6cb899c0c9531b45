/**
 * Serves a ForgeMcpServer over stdio or over streamable HTTP
 */

import { randomUUID } from 'node:crypto';
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { ConfigurationError, ErrorHandler } from '../infrastructure/errors/error-handler.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { SessionManager } from '../infrastructure/session/session-manager.js';
import type { ForgeMcpServer } from './mcp-server.js';

export const MCP_PATH = '/mcp';

const SESSION_CLEANUP_INTERVAL = 10 * 60 * 1000;

export interface ServeOptions {
  httpAddress?: string;
  logger: Logger;
}

export interface RunningServer {
  /** Bound port in HTTP mode */
  port?: number;
  close(): Promise<void>;
}

export interface ListenAddress {
  host?: string;
  port: number;
}

/**
 * Accepts `8080`, `:8080`, `host:8080` and `[::1]:8080`.
 */
export function parseListenAddress(address: string): ListenAddress {
  const trimmed = address.trim();
  const separator = trimmed.lastIndexOf(':');
  const hostPart = separator >= 0 ? trimmed.slice(0, separator) : '';
  const portPart = separator >= 0 ? trimmed.slice(separator + 1) : trimmed;

  const port = Number(portPart);
  if (!/^\d+$/.test(portPart) || port > 65535) {
    throw new ConfigurationError(`invalid HTTP address: ${address}`);
  }

  const host = hostPart.replace(/^\[(.*)\]$/, '$1');
  return host ? { host, port } : { port };
}

/**
 * Carries the inbound `Authorization` value, whatever its scheme, to the call
 * handlers through the SDK's `authInfo`.
 */
export function authInfoFromHeader(header: string | undefined): AuthInfo | undefined {
  const token = header?.trim();
  if (!token) {
    return undefined;
  }

  return {
    token,
    clientId: 'forwarded',
    scopes: []
  };
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' }).end(
    JSON.stringify({
      jsonrpc: '2.0',
      error: { code, message },
      id: null
    })
  );
}

export async function serve(forge: ForgeMcpServer, options: ServeOptions): Promise<RunningServer> {
  if (options.httpAddress) {
    return serveHttp(forge, options.httpAddress, options.logger);
  }
  return serveStdio(forge, options.logger);
}

async function serveStdio(forge: ForgeMcpServer, logger: Logger): Promise<RunningServer> {
  const server = forge.createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(`MCP server running on stdio with ${forge.getToolNames().length} tools`);

  return {
    close: () => server.close()
  };
}

async function handleHttpRequest(
  forge: ForgeMcpServer,
  sessions: SessionManager<StreamableHTTPServerTransport>,
  req: IncomingMessage,
  res: ServerResponse,
  logger: Logger
): Promise<void> {
  const { pathname } = new URL(req.url ?? '/', 'http://localhost');
  if (pathname !== MCP_PATH) {
    writeJsonRpcError(res, 404, -32000, `Not found: ${pathname}`);
    return;
  }

  const request = Object.assign(req, { auth: authInfoFromHeader(req.headers.authorization) });

  const sessionId = headerValue(req.headers['mcp-session-id']);
  if (sessionId) {
    const transport = sessions.get(sessionId);
    if (!transport) {
      writeJsonRpcError(res, 404, -32001, 'Session not found');
      return;
    }
    await transport.handleRequest(request, res);
    return;
  }

  const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (id: string) => {
      sessions.add(id, transport);
      logger.debug({ sessionId: id }, 'HTTP session initialized');
    }
  });
  transport.onclose = () => {
    if (transport.sessionId) {
      sessions.remove(transport.sessionId);
      logger.debug({ sessionId: transport.sessionId }, 'HTTP session closed');
    }
  };

  const server = forge.createServer();
  await server.connect(transport);
  await transport.handleRequest(request, res);
}

async function serveHttp(forge: ForgeMcpServer, address: string, logger: Logger): Promise<RunningServer> {
  const { host, port } = parseListenAddress(address);
  const sessions = new SessionManager<StreamableHTTPServerTransport>();

  const httpServer = createServer((req, res) => {
    handleHttpRequest(forge, sessions, req, res, logger).catch((error: unknown) => {
      logger.error(`HTTP request failed: ${ErrorHandler.sanitizeErrorForLogging(error)}`);
      if (!res.headersSent) {
        writeJsonRpcError(res, 500, -32603, 'Internal server error');
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const cleanupTimer = setInterval(() => {
    sessions.cleanup().then(
      closed => {
        if (closed > 0) {
          logger.debug({ closed }, 'Closed idle HTTP sessions');
        }
      },
      (error: unknown) => {
        logger.warn(`Session cleanup failed: ${ErrorHandler.sanitizeErrorForLogging(error)}`);
      }
    );
  }, SESSION_CLEANUP_INTERVAL);
  cleanupTimer.unref();

  const bound = httpServer.address();
  const boundPort = bound !== null && typeof bound === 'object' ? bound.port : port;

  logger.info(
    `MCP server using Streamable HTTP transport at http://${host ?? 'localhost'}:${boundPort}${MCP_PATH} with ${forge.getToolNames().length} tools`
  );

  return {
    port: boundPort,
    close: async () => {
      clearInterval(cleanupTimer);
      await sessions.closeAll();
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close(error => (error ? reject(error) : resolve()));
      });
    }
  };
}
