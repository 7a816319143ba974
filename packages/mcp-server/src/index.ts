#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { LogLevel, LoggingService, parseLogLevel } from '@manuscript-assembler/core';
import { describeConfigProblems, loadConfig } from './config.js';
import { createServices } from './handlers.js';
import { createServer } from './server.js';

// Initialize services
const config = loadConfig();
const logger = new LoggingService('manuscript-assembler-mcp', parseLogLevel(config.logLevel) ?? LogLevel.INFO);
for (const problem of describeConfigProblems(config)) {
  logger.warn(problem.message, problem.suggestions);
}

const server = createServer(createServices(config, logger));

// Start server
async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Manuscript assembler MCP server running on stdio (templates: ${config.templatesDir})`);
}

main().catch((error) => {
  logger.error('Fatal error', error instanceof Error ? error : undefined);
  process.exit(1);
});
