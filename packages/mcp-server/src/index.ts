#!/usr/bin/env node

/**
 * KinematicMCP - motion profile planning over MCP.
 *
 * Exposes trapezoid motion-profile planning and sampling to AI agents, with
 * named constraint presets loaded from YAML.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { HELP_TEXT, parseArgs } from './utils/cli-args.js';
import { getProfileTools, handleProfileTool } from './tools/profile-tools.js';
import { isLogLevel, logger } from './utils/logger.js';
import { runStartupChecks, printStartupChecks } from './utils/startup-check.js';

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed === 'help') {
    process.stderr.write(HELP_TEXT);
    return;
  }
  if (parsed === 'version') {
    process.stderr.write(`${SERVER_VERSION}\n`);
    return;
  }

  if (isLogLevel(parsed.logLevel)) {
    logger.setLevel(parsed.logLevel);
  }
  if (parsed.jsonLogs) {
    logger.setFormat('json');
  }

  // Startup self-test
  const startupResult = runStartupChecks(parsed);
  printStartupChecks(startupResult);
  if (!startupResult.passed) {
    process.exitCode = 1;
    return;
  }

  const { presets } = startupResult;
  const tools = getProfileTools();

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      return await handleProfileTool(name, args ?? {}, presets);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Tool error (${name}): ${message}`);
      return {
        content: [{ type: 'text', text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', { error: String(error) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();

  logger.info(`Starting ${SERVER_NAME} v${SERVER_VERSION}`);
  logger.info(`Presets: ${[...presets.keys()].join(', ')}`);
  logger.info(`Tools registered: ${tools.length}`);

  await server.connect(transport);
}

main().catch((error: unknown) => {
  logger.error('Failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
