import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from '../shared/config/env';
import { registerShutdownHooks } from '../core/runtime/shutdown';
import {
  createSidekickServices,
  type SidekickConfig,
  type SidekickServiceOverrides,
  type SidekickServices,
} from '../core/runtime/sidekickServices';
import { createSidekickRegistry } from '../core/tools/sidekickTools';
import type { ToolRegistry } from '../core/tools/toolRegistry';
import { AppError } from '../shared/errors/app-error';
import { logger } from '../shared/logging/logger';

export const SERVER_NAME = 'llm-sidekick';
export const SERVER_VERSION = '1.0.0';

export interface SidekickApp {
  server: McpServer;
  registry: ToolRegistry;
  services: SidekickServices;
}

/**
 * Build the MCP server with every sidekick tool registered. The server is not
 * connected to a transport yet.
 */
export function createSidekickServer(
  appConfig: SidekickConfig,
  overrides: SidekickServiceOverrides = {},
): SidekickApp {
  const services = createSidekickServices(appConfig, overrides);
  const registry = createSidekickRegistry(services);

  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const tool of registry.list()) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputShape,
      },
      async (args, extra) => {
        const text = await registry.execute(tool.name, args, { clientId: extra.sessionId });
        return { content: [{ type: 'text', text }] };
      },
    );
  }

  return { server, registry, services };
}

export async function bootstrapApp(): Promise<void> {
  try {
    const { server, registry } = createSidekickServer(config);

    registerShutdownHooks({ server });

    const transport = new StdioServerTransport();
    await server.connect(transport);

    logger.info(
      {
        backend: config.backendBaseUrl,
        rateLimit: `${config.RATE_LIMIT_MAX_REQUESTS}/${config.RATE_LIMIT_WINDOW}s`,
        maxContextTokens: config.MAX_CONTEXT_SIZE,
        recommendedModel: config.RECOMMENDED_MODEL,
        tools: registry.listNames().length,
      },
      'Sidekick MCP server listening on stdio',
    );
  } catch (error) {
    throw new AppError('BOOTSTRAP_FAILED', 'Application bootstrap failed', error);
  }
}
