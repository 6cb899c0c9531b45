/**
 * Diagnostic logging. Everything goes to stderr: in stdio mode stdout is the
 * protocol channel.
 */

import { createHash } from 'node:crypto';
import { destination, pino, type DestinationStream, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  debug?: boolean;
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: 'graphql-forge-mcp',
      level: options.debug ? 'debug' : 'info'
    },
    options.destination ?? destination({ fd: 2, sync: true })
  );
}

/**
 * SHA-256 hex digest of a credential, for logs.
 */
export function hashCredential(credential: string): string {
  return createHash('sha256').update(credential).digest('hex');
}
