import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { OutlineChatConfig } from './config.js';
import {
  appendHeading,
  createThread,
  getThread,
  listThreads,
  previewMessages,
  respondInThread,
} from './thread/api.js';
import { OpenAiCompatibleTransport } from './transport/openai.js';
import type { Transport } from './transport/types.js';

export interface ServerOptions {
  /** Builds the transport for `thread.respond`; defaults to the OpenAI-compatible one. */
  createTransport?: (config: OutlineChatConfig) => Transport;
}

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention: `thread.*` operates on thread documents. Lines are
 * 1-based; an omitted line means the last heading of the document.
 */
export function createMcpServer(config: OutlineChatConfig, options: ServerOptions = {}): McpServer {
  const server = new McpServer({ name: 'outline-chat-mcp', version: '0.1.0' });
  const createTransport =
    options.createTransport ?? ((current: OutlineChatConfig) => new OpenAiCompatibleTransport(current.transport));

  server.registerTool(
    'thread.list',
    {
      title: 'List threads',
      description: 'List conversation thread files under the threads directory.',
      inputSchema: {
        query: z.string().optional(),
      },
      outputSchema: {
        threads: z.array(
          z.object({
            threadId: z.string(),
            title: z.string(),
            path: z.string(),
            headings: z.number(),
          })
        ),
      },
    },
    async ({ query }) => {
      const threads = await listThreads(config, { query });
      return {
        content: [{ type: 'text', text: JSON.stringify({ threads }, null, 2) }],
        structuredContent: { threads },
      };
    }
  );

  server.registerTool(
    'thread.get',
    {
      title: 'Get a thread',
      description: 'Read a thread file and return its heading tree with message bodies.',
      inputSchema: {
        threadId: z.string(),
        includeBodies: z.boolean().optional(),
      },
      outputSchema: {
        thread: z.any(),
        etag: z.string(),
      },
    },
    async ({ threadId, includeBodies }) => {
      const { thread, etag } = await getThread(config, { threadId, includeBodies });
      return {
        content: [{ type: 'text', text: JSON.stringify({ thread, etag }, null, 2) }],
        structuredContent: { thread, etag },
      };
    }
  );

  server.registerTool(
    'thread.create',
    {
      title: 'Create a thread',
      description:
        'Create a new thread file with one user heading. A region, when given, is quoted (fenced as a source block for code) and becomes the first message.',
      inputSchema: {
        region: z.string().optional(),
        mode: z.string().optional(),
        fileName: z.string().optional(),
      },
      outputSchema: {
        threadId: z.string(),
        path: z.string(),
        etag: z.string(),
        line: z.number(),
      },
    },
    async ({ region, mode, fileName }) => {
      const created = await createThread(config, { region, mode, fileName });
      return {
        content: [{ type: 'text', text: JSON.stringify(created, null, 2) }],
        structuredContent: { ...created },
      };
    }
  );

  server.registerTool(
    'thread.appendHeading',
    {
      title: 'Append a user heading',
      description: 'Append a new top-level user heading at the end of a thread.',
      inputSchema: {
        threadId: z.string(),
        ifMatch: z.string().optional(),
      },
      outputSchema: { line: z.number(), etag: z.string() },
    },
    async ({ threadId, ifMatch }) => {
      const result = await appendHeading(config, { threadId, ifMatch });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: { ...result },
      };
    }
  );

  server.registerTool(
    'thread.messages',
    {
      title: 'Preview conversation',
      description: 'Build the message list that responding at a heading would send, without sending it.',
      inputSchema: {
        threadId: z.string(),
        line: z.number().int().min(1).optional(),
      },
      outputSchema: {
        heading: z.string(),
        line: z.number(),
        messages: z.array(messageSchema),
        etag: z.string(),
      },
    },
    async ({ threadId, line }) => {
      const result = await previewMessages(config, { threadId, line });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: { ...result },
      };
    }
  );

  server.registerTool(
    'thread.respond',
    {
      title: 'Respond in a thread',
      description:
        'Add an assistant heading under the target heading, stream the reply into it, and reserve a user heading for the next turn.',
      inputSchema: {
        threadId: z.string(),
        line: z.number().int().min(1).optional(),
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        reply: z.string(),
        aiLine: z.number(),
        userLine: z.number(),
        etag: z.string(),
      },
    },
    async ({ threadId, line, ifMatch }) => {
      const result = await respondInThread(config, {
        threadId,
        line,
        ifMatch,
        transport: createTransport(config),
      });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: { ...result },
      };
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 */
export async function runStdioServer(config: OutlineChatConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
