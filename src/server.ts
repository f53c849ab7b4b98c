import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig } from './config.js';
import { NdjsonLogger, errorMessage } from './common/logger.js';
import type { Sleep } from './common/retry.js';
import type { ImageBackend } from './gemini/backend.js';
import { renderOutcome, type ToolOutcome } from './result.js';
import { withSpan } from './telemetry/tracing.js';
import { TOOLS, TOOLS_BY_NAME, type ToolContext } from './tools.js';

const logger = new NdjsonLogger('mcp-server');

export const SERVER_NAME = 'image-tools';
export const SERVER_VERSION = '0.1.0';

export function createToolContext(config: ServerConfig, backend: ImageBackend, sleep?: Sleep): ToolContext {
  return {
    backend,
    outputDir: config.outputDir,
    strict: config.strict,
    retry: config.retry,
    describeModel: config.describeModel,
    sleep,
  };
}

export function createImageServer(ctx: ToolContext): Server {
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
    return {
      tools: TOOLS.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  // Operation failures come back as "Error: ..." text; anything thrown propagates as a protocol error.
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const tool = TOOLS_BY_NAME.get(name);
    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    const startTime = Date.now();
    let outcome: ToolOutcome;
    try {
      outcome = await withSpan(`tool.${name}`, async (span) => {
        const result = await tool.invoke(ctx, args);
        span.setAttribute('tool.ok', result.ok);
        return result;
      }, { 'tool.name': name });
    } catch (error) {
      if (!(error instanceof McpError)) {
        logger.error('tool_failed', { tool: name, message: errorMessage(error), elapsedMs: Date.now() - startTime });
      }
      throw error;
    }

    logger.info('tool_call', {
      tool: name,
      ok: outcome.ok,
      kind: outcome.ok ? undefined : outcome.kind,
      elapsedMs: Date.now() - startTime,
    });

    return {
      content: [
        {
          type: 'text',
          text: renderOutcome(outcome),
        },
      ],
    };
  });

  return server;
}
