import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Logger } from 'pino';
import { withJamaClient } from './core/lifecycle.js';
import type { AcquireOptions, ClientLease } from './core/lifecycle.js';
import { NotFoundError } from './core/errors.js';
import { TOOL_DEFINITIONS, callTool } from './api/tools.js';

export const SERVER_NAME = 'Jama Connect Server';
export const SERVER_VERSION = '0.1.0';

const STATUS_URI = 'jama://status';

/**
 * Build the MCP server around an acquired client lease.
 *
 * Handlers only read `lease.context`; the lease is acquired before this is
 * called and released by whoever acquired it.
 */
export function createJamaServer(lease: ClientLease, log: Logger): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: {
        tools: {},
        resources: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(name, args, lease.context, log);
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: STATUS_URI,
          name: 'Jama MCP Status',
          description: 'Client mode and tool count of this server',
          mimeType: 'application/json'
        }
      ]
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    if (uri === STATUS_URI) {
      return {
        contents: [
          {
            uri,
            mimeType: 'application/json',
            text: JSON.stringify(
              {
                server: SERVER_NAME,
                version: SERVER_VERSION,
                mode: lease.mode,
                toolCount: TOOL_DEFINITIONS.length
              },
              null,
              2
            )
          }
        ]
      };
    }

    throw new NotFoundError('Resource', uri);
  });

  return server;
}

export interface ServeOptions extends AcquireOptions {
  transport: Transport;
}

/**
 * Acquire the client lease, serve MCP on `transport` until it closes, then
 * release the lease. The lease is also released when setup or connect fails.
 */
export async function serveJama(env: NodeJS.ProcessEnv, opts: ServeOptions): Promise<void> {
  const { transport, log } = opts;

  await withJamaClient(env, opts, async (lease) => {
    const server = createJamaServer(lease, log);
    const closed = new Promise<void>((resolve) => {
      server.onclose = resolve;
    });

    await server.connect(transport);
    log.info({ mode: lease.mode }, 'Jama MCP server listening');
    await closed;
  });
}
