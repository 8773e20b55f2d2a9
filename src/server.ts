import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { registerTools, handleToolCall } from './tools/index.js';
import { registerResources, handleResourceRead } from './resources/index.js';
import { type ServiceContainer, getContainer, loadServiceConfig } from './services/index.js';
import { logger } from './utils/logger.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

/**
 * reqclarity MCP Server
 *
 * Grades the clarity of software requirement statements.
 */
export class ReqClarityServer {
  private server: Server;
  private container: ServiceContainer;

  constructor(container?: ServiceContainer) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.container = container ?? getContainer(loadServiceConfig());
    this.setupHandlers();
  }

  private setupHandlers(): void {
    // Tool listing
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: registerTools(),
      };
    });

    // Tool execution
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return handleToolCall(name, args ?? {}, this.container);
    });

    // Resource listing
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return {
        resources: registerResources(await this.container.getStorage()),
      };
    });

    // Resource reading
    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      return handleResourceRead(uri, await this.container.getStorage());
    });
  }

  async start(): Promise<void> {
    // stdout carries the MCP protocol from here on
    logger.useStderr();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    logger.info('reqclarity MCP server started', { version: SERVER_VERSION });

    // Training starts now; tool calls report a failure again when they need the analyzer
    this.container.getAnalyzer().catch((error: unknown) => {
      logger.error('Analyzer initialization failed', error);
    });
  }

  async stop(): Promise<void> {
    await this.server.close();
    this.container.close();
  }
}
