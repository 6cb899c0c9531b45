/**
 * Resolves the bearer credential for an outbound GraphQL call, either by
 * running the configured token command or by forwarding the credential the
 * inbound request carried.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { TokenCommandError } from '../../infrastructure/errors/error-handler.js';
import { hashCredential, type Logger } from '../../infrastructure/logging/logger.js';
import type { ServerSettings } from '../../types/config.js';
import type { InvocationContext } from '../../types/mcp.js';

const execFileAsync = promisify(execFile);

export const BEARER_PREFIX = 'Bearer ';

export interface ShellInvocation {
  file: string;
  args: string[];
}

export function shellFor(command: string, platform: NodeJS.Platform = process.platform): ShellInvocation {
  if (platform === 'win32') {
    return { file: process.env.ComSpec || 'cmd.exe', args: ['/C', command] };
  }
  return { file: '/bin/sh', args: ['-c', command] };
}

/**
 * Environment for the token command: empty, or a copy of `baseEnv` when
 * passthrough is enabled, with the configured overrides laid on top.
 */
export function buildCommandEnvironment(
  settings: Pick<ServerSettings, 'env' | 'envPassthrough'>,
  baseEnv: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  if (settings.envPassthrough) {
    for (const [key, value] of Object.entries(baseEnv)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }
  }
  for (const [key, value] of Object.entries(settings.env)) {
    env[key] = value;
  }
  return env;
}

/**
 * Splits an inbound `Authorization` value into scheme and credential. A value
 * without a scheme is kept whole; a bare `Bearer` carries nothing.
 */
export function parseAuthorizationHeader(header: string | undefined): InvocationContext {
  const value = header?.trim();
  if (!value || value.toLowerCase() === 'bearer') {
    return {};
  }

  const match = /^(\S+)\s+(\S.*)$/.exec(value);
  if (!match) {
    return { credential: value, scheme: '' };
  }
  return { credential: match[2].trim(), scheme: match[1] };
}

function formatPassThrough(credential: string, scheme: string = 'Bearer'): string {
  if (scheme === '') {
    return credential;
  }
  if (scheme.toLowerCase() === 'bearer') {
    return BEARER_PREFIX + credential;
  }
  return `${scheme} ${credential}`;
}

function readStderr(error: unknown): string {
  if (typeof error !== 'object' || error === null || !('stderr' in error)) {
    return '';
  }
  const { stderr } = error;
  if (typeof stderr === 'string') {
    return stderr.trim();
  }
  return Buffer.isBuffer(stderr) ? stderr.toString('utf-8').trim() : '';
}

function describeFailure(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return `exit status ${error.code}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class TokenProvider {
  constructor(
    private readonly settings: ServerSettings,
    private readonly logger: Logger
  ) {}

  async resolve(context: InvocationContext): Promise<string> {
    if (this.settings.tokenCommand) {
      const token = await this.runTokenCommand(this.settings.tokenCommand);
      const credential = BEARER_PREFIX + token;
      this.logger.debug({ sha256: hashCredential(credential) }, 'Obtained token from token_command');
      return credential;
    }

    if (!context.credential) {
      this.logger.debug('No token_command and no pass-through credential, calling without Authorization');
      return '';
    }

    const credential = formatPassThrough(context.credential, context.scheme);
    this.logger.debug({ sha256: hashCredential(credential) }, 'Using pass-through token');
    return credential;
  }

  private async runTokenCommand(command: string): Promise<string> {
    const { file, args } = shellFor(command);
    const env = buildCommandEnvironment(this.settings);

    this.logger.debug({ command, envKeys: Object.keys(env) }, 'Executing token command');

    try {
      const { stdout } = await execFileAsync(file, args, {
        env,
        encoding: 'utf-8',
        windowsHide: true
      });
      return stdout.trim();
    } catch (error) {
      const stderr = readStderr(error);
      const status = describeFailure(error);
      const message = stderr
        ? `token_command failed: ${status} Stderr: ${stderr}`
        : `token_command failed: ${status}`;
      throw new TokenCommandError(message, stderr, { cause: error });
    }
  }
}
