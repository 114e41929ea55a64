import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { TreeConfig } from './config.js';
import { OsCatalog } from './catalog.js';
import { Distro } from './distro.js';
import { TreeFetcher, createFetcher } from './fetcher.js';
import { withDetectedTree } from './detect.js';
import { logger, redactErrorMessage } from './logging.js';
import {
  OsListSchema,
  TreeDetectError,
  TreeLocationParams,
  TreeLocationSchema
} from './types.js';

/**
 * Text result returned from a tool call
 */
export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type FetcherFactory = (location: string, config: TreeConfig) => TreeFetcher;

export interface TreeServerOptions {
  config: TreeConfig;
  catalog: OsCatalog;
  fetcherFactory?: FetcherFactory;
}

const locationProperties = {
  location: { type: 'string', description: 'Install tree root: local path, file://, http(s):// or sftp:// URL' },
  arch: { type: 'string', description: 'Guest architecture (default: x86_64)' },
  guestType: { type: 'string', enum: ['hvm', 'xen'], description: 'Guest virtualization type (default: hvm)' },
  distro: { type: 'string', description: 'Distro id to try first, e.g. fedora, rhel, sles, debian' },
  osVariant: { type: 'string', description: 'OS id whose distro is tried first, e.g. fedora40' }
};

function textResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

/**
 * MCP server exposing install tree detection
 */
export class InstallTreeMCPServer {
  private server: Server;
  private readonly config: TreeConfig;
  private readonly catalog: OsCatalog;
  private readonly fetcherFactory: FetcherFactory;

  constructor(options: TreeServerOptions) {
    this.config = options.config;
    this.catalog = options.catalog;
    this.fetcherFactory = options.fetcherFactory ?? createFetcher;

    this.server = new Server(
      {
        name: 'install-tree-mcp',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
    this.setupErrorHandling();
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: [
          {
            name: 'tree_detect',
            description: 'Detects the distribution of an install tree and lists its boot artifacts',
            inputSchema: {
              type: 'object',
              properties: locationProperties,
              required: ['location']
            }
          },
          {
            name: 'tree_fetchKernel',
            description: 'Downloads the kernel and initrd of an install tree to local scratch space',
            inputSchema: {
              type: 'object',
              properties: locationProperties,
              required: ['location']
            }
          },
          {
            name: 'tree_fetchBootIso',
            description: 'Downloads the boot ISO of an install tree to local scratch space',
            inputSchema: {
              type: 'object',
              properties: locationProperties,
              required: ['location']
            }
          },
          {
            name: 'os_list',
            description: 'Lists known operating systems, newest first per distro',
            inputSchema: {
              type: 'object',
              properties: {
                prefix: { type: 'string', description: 'Only ids starting with this prefix' },
                distro: { type: 'string', description: 'Only entries of this distro id' }
              }
            }
          }
        ]
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  /**
   * Runs one tool; failures come back as error results, never as throws
   */
  async callTool(name: string, args: unknown): Promise<ToolResult> {
    try {
      switch (name) {
        case 'tree_detect': {
          const params = TreeLocationSchema.parse(args ?? {});
          const result = await this.withDistro(params, async (distro) => distro.toDescriptor());
          logger.info('Tree detected', { location: params.location, distro: result.prettyName });
          return textResult(result);
        }

        case 'tree_fetchKernel': {
          const params = TreeLocationSchema.parse(args ?? {});
          const result = await this.withDistro(params, async (distro) => ({
            osVariant: distro.getOsVariant(),
            ...(await distro.acquireKernel())
          }));
          logger.info('Kernel fetched', { location: params.location, kernel: result.kernel });
          return textResult(result);
        }

        case 'tree_fetchBootIso': {
          const params = TreeLocationSchema.parse(args ?? {});
          const result = await this.withDistro(params, async (distro) => ({
            osVariant: distro.getOsVariant(),
            bootIso: await distro.acquireBootIso()
          }));
          logger.info('Boot ISO fetched', { location: params.location, bootIso: result.bootIso });
          return textResult(result);
        }

        case 'os_list': {
          const params = OsListSchema.parse(args ?? {});
          return textResult(this.catalog.listAll(params));
        }

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const message = error instanceof z.ZodError
        ? `Invalid arguments: ${error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`
        : error instanceof Error ? error.message : String(error);
      const hint = error instanceof TreeDetectError && error.hint ? `\nHint: ${error.hint}` : '';

      logger.error('Tool execution failed', { tool: name, error: message });
      return {
        content: [{ type: 'text', text: `Error: ${redactErrorMessage(message)}${hint}` }],
        isError: true
      };
    }
  }

  /**
   * Detects the tree and runs `action` on it
   */
  private withDistro<T>(params: TreeLocationParams, action: (distro: Distro) => Promise<T>): Promise<T> {
    return withDetectedTree(
      params.location,
      {
        arch: params.arch,
        guestType: params.guestType,
        distro: params.distro,
        osVariant: params.osVariant,
        config: this.config,
        catalog: this.catalog,
        fetcherFactory: this.fetcherFactory
      },
      action
    );
  }

  private setupErrorHandling() {
    this.server.onerror = (error) => {
      logger.error('Server error', { error: error.message });
    };
  }

  async run() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('Install tree MCP server started successfully');
  }

  async close() {
    await this.server.close();
  }
}
