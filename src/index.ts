#!/usr/bin/env node

/**
 * Install Tree MCP Server - Entry Point
 *
 * A Model Context Protocol (MCP) server that recognizes OS install trees
 * (mirrors, mounted ISOs, trees reachable over SFTP) and resolves the
 * kernel/initrd or boot ISO needed to start their installer.
 */

import { InstallTreeMCPServer } from './mcp.js';
import { loadConfig } from './config.js';
import { DEFAULT_CATALOG_PATH, loadOsCatalog } from './catalog.js';
import { logger } from './logging.js';

let server: InstallTreeMCPServer | undefined;

async function main() {
  try {
    logger.info('Starting install tree MCP server...');

    const config = loadConfig();
    logger.setLevel(config.logLevel);

    const catalog = loadOsCatalog(config.catalogPath ?? DEFAULT_CATALOG_PATH);
    server = new InstallTreeMCPServer({ config, catalog });
    await server.run();

    // Keep the process running for MCP stdio communication
    process.stdin.resume();
  } catch (error) {
    logger.error('Failed to start install tree MCP server', { error });
    process.exit(1);
  }
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason });
  process.exit(1);
});

async function gracefulShutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    await server?.close();
  } catch (error) {
    logger.error('Error during graceful shutdown', { error });
  }
  process.exit(0);
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

void main();
