#!/usr/bin/env node

/**
 * Entry point for the GraphQL forge MCP server
 */

import { Command } from 'commander';

import { loadAppConfig, loadToolDefinitions, type AppConfigOptions } from './config/config-loader.js';
import { ErrorHandler } from './infrastructure/errors/error-handler.js';
import { createLogger } from './infrastructure/logging/logger.js';
import { ForgeMcpServer } from './server/mcp-server.js';
import { serve } from './server/transport.js';
import { VERSION } from './version.js';

function parseOptions(argv: string[]): AppConfigOptions {
  const program = new Command()
    .name('graphql-forge-mcp')
    .description('Expose GraphQL queries declared in YAML as MCP tools')
    .version(VERSION)
    .option('--forgeConfig <dir>', 'configuration directory (defaults to FORGE_CONFIG)')
    .option('--forgeDebug', 'enable debug logging to stderr (defaults to FORGE_DEBUG)')
    .option('--http <address>', 'serve streamable HTTP on the given port or host:port instead of stdio')
    .parse(argv);

  return program.opts<AppConfigOptions>();
}

async function main(): Promise<void> {
  const options = parseOptions(process.argv);

  let logger = createLogger();
  try {
    const appConfig = await loadAppConfig(options);
    logger = createLogger({ debug: appConfig.isDebug });
    logger.debug({ configDir: appConfig.configDir }, 'Debug mode enabled');

    const definitions = await loadToolDefinitions(appConfig.configDir, logger);
    const forge = new ForgeMcpServer({
      settings: appConfig.settings,
      definitions,
      logger
    });

    const running = await serve(forge, { httpAddress: appConfig.httpAddress, logger });

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down`);
      running.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${ErrorHandler.sanitizeErrorForLogging(error)}`);
          process.exit(1);
        }
      );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.fatal(`Fatal error starting server: ${ErrorHandler.sanitizeErrorForLogging(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
