/**
 * Loads the settings document and the tool definitions from a configuration
 * directory
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';

import {
  ConfigurationError,
  ErrorHandler,
  ToolDefinitionError
} from '../infrastructure/errors/error-handler.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import {
  OUTPUT_FORMATS,
  SETTINGS_FILE_NAME,
  serverSettingsSchema,
  toolDefinitionSchema,
  type AppConfig,
  type OutputFormat,
  type ServerSettings,
  type ToolDefinition
} from '../types/config.js';
import { VERSION } from '../version.js';

const DEFAULT_SERVER_NAME = 'graphql-forge';
const TOOL_FILE_PATTERN = /\.ya?ml$/;

export interface AppConfigOptions {
  forgeConfig?: string;
  forgeDebug?: boolean;
  http?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

async function readYaml(path: string): Promise<unknown> {
  const text = await readFile(path, 'utf-8');
  return parseYaml(text);
}

export async function loadServerSettings(path: string): Promise<ServerSettings> {
  let document: unknown;
  try {
    document = await readYaml(path);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read settings ${path}: ${ErrorHandler.sanitizeErrorForLogging(error)}`,
      { cause: error }
    );
  }

  const parsed = serverSettingsSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings ${path}: ${formatIssues(parsed.error)}`);
  }

  const raw = parsed.data;
  return Object.freeze({
    name: raw.name || DEFAULT_SERVER_NAME,
    version: raw.version || VERSION,
    url: raw.url,
    tokenCommand: raw.token_command || undefined,
    env: Object.freeze({ ...raw.env }),
    envPassthrough: raw.env_passthrough ?? false
  });
}

export async function loadToolDefinition(path: string, logger?: Logger): Promise<ToolDefinition> {
  let document: unknown;
  try {
    document = await readYaml(path);
  } catch (error) {
    throw new ToolDefinitionError(
      `Failed to read tool definition: ${ErrorHandler.sanitizeErrorForLogging(error)}`,
      path,
      { cause: error }
    );
  }

  const parsed = toolDefinitionSchema.safeParse(document);
  if (!parsed.success) {
    throw new ToolDefinitionError(`Invalid tool definition: ${formatIssues(parsed.error)}`, path);
  }

  const raw = parsed.data;
  let output: OutputFormat = 'raw';
  if (raw.output) {
    if (isOutputFormat(raw.output)) {
      output = raw.output;
    } else {
      logger?.warn({ file: path, output: raw.output }, `Unsupported output format "${raw.output}" in ${raw.name}, using raw`);
    }
  }

  return Object.freeze({
    name: raw.name,
    description: raw.description ?? '',
    query: raw.query,
    inputs: Object.freeze(
      (raw.inputs ?? []).map(input =>
        Object.freeze({
          name: input.name,
          type: input.type,
          description: input.description ?? '',
          required: input.required ?? false
        })
      )
    ),
    annotations: raw.annotations ?? undefined,
    output,
    sourceFile: path
  });
}

/**
 * Every YAML file in the directory other than the settings file is a tool.
 * Files that fail to load are skipped with a warning.
 */
export async function loadToolDefinitions(configDir: string, logger: Logger): Promise<ToolDefinition[]> {
  let entries: string[];
  try {
    entries = await readdir(configDir);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to discover tools in ${configDir}: ${ErrorHandler.sanitizeErrorForLogging(error)}`,
      { cause: error }
    );
  }

  const files = entries
    .filter(entry => TOOL_FILE_PATTERN.test(entry) && entry !== SETTINGS_FILE_NAME)
    .sort();

  const definitions: ToolDefinition[] = [];
  for (const file of files) {
    const path = join(configDir, file);
    try {
      definitions.push(await loadToolDefinition(path, logger));
    } catch (error) {
      logger.warn({ file: path }, `Skipping ${path}: ${ErrorHandler.sanitizeErrorForLogging(error)}`);
    }
  }

  return definitions;
}

/**
 * Truthy spellings are 1, t, T, TRUE, true and True. Anything else is false.
 */
export function parseBooleanFlag(value: string | undefined): boolean {
  switch (value) {
    case '1':
    case 't':
    case 'T':
    case 'TRUE':
    case 'true':
    case 'True':
      return true;
    default:
      return false;
  }
}

export async function loadAppConfig(
  options: AppConfigOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const configDir = options.forgeConfig || env.FORGE_CONFIG;
  if (!configDir) {
    throw new ConfigurationError(
      'configuration directory must be set via --forgeConfig flag or FORGE_CONFIG environment variable'
    );
  }

  const isDebug = options.forgeDebug === true || parseBooleanFlag(env.FORGE_DEBUG);
  const settings = await loadServerSettings(join(configDir, SETTINGS_FILE_NAME));

  return {
    configDir,
    isDebug,
    httpAddress: options.http || undefined,
    settings
  };
}
