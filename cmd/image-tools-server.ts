#!/usr/bin/env node
// Load environment variables from .env before anything reads process.env
import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../src/config.js';
import { GeminiBackend } from '../src/gemini/backend.js';
import { createImageServer, createToolContext } from '../src/server.js';
import { initTelemetry, shutdownTelemetry } from '../src/telemetry/tracing.js';

async function main() {
  const config = loadConfig();
  initTelemetry();

  const server = createImageServer(createToolContext(config, new GeminiBackend(config.apiKey)));
  const transport = new StdioServerTransport();

  const shutdown = async () => {
    await server.close();
    await shutdownTelemetry();
    process.exit(0);
  };
  const onShutdownError = (error: unknown) => {
    console.error('Shutdown error:', error);
    process.exit(1);
  };
  process.on('SIGINT', () => shutdown().catch(onShutdownError));
  process.on('SIGTERM', () => shutdown().catch(onShutdownError));
  // the client closing stdio ends the session
  process.stdin.on('end', () => shutdown().catch(onShutdownError));

  await server.connect(transport);

  // Log to stderr so it doesn't interfere with stdio protocol
  console.error(`Image tools MCP server started (output: ${config.outputDir})`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
