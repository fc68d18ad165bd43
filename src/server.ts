import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { BookmarkViewConfig } from './config.js';
import { formatBookmarksDoc, getBookmarks, validateBookmarksDoc } from './bkm/api.js';

const diagnosticSchema = z.object({
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  line: z.number().optional(),
});

/**
 * Create an MCP server instance and register all tools.
 *
 * Every tool takes `documentPath`, the document whose `.bkm` sidecar is read,
 * relative to the configured root.
 */
export function createMcpServer(config: BookmarkViewConfig): McpServer {
  const server = new McpServer({ name: 'bookmark-view-mcp', version: '0.1.0' });

  server.registerTool(
    'bookmarks.get',
    {
      title: 'Get a bookmark view',
      description:
        'Read and parse the .bkm sidecar of a document. Returns entries in tree or flat view.',
      inputSchema: {
        documentPath: z.string(),
        view: z.enum(['tree', 'flat']).optional(),
      },
      outputSchema: {
        bookmarks: z.any(),
        etag: z.string(),
      },
    },
    async ({ documentPath, view }) => {
      const { bookmarks, etag } = await getBookmarks(config, { documentPath, view });
      return {
        content: [{ type: 'text', text: JSON.stringify({ bookmarks, etag }, null, 2) }],
        structuredContent: { bookmarks, etag },
      };
    }
  );

  server.registerTool(
    'bookmarks.validate',
    {
      title: 'Validate a bookmark view',
      description: 'Report structural errors and tolerated problems in a .bkm sidecar.',
      inputSchema: {
        documentPath: z.string(),
      },
      outputSchema: {
        errors: z.array(diagnosticSchema),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ documentPath }) => {
      const { errors, warnings } = await validateBookmarksDoc(config, { documentPath });
      return {
        content: [{ type: 'text', text: JSON.stringify({ errors, warnings }, null, 2) }],
        structuredContent: { errors, warnings },
      };
    }
  );

  server.registerTool(
    'bookmarks.format',
    {
      title: 'Rewrite a bookmark view in canonical form',
      description:
        'Parse a .bkm sidecar and write it back in canonical form. Unknown tokens are dropped and the view title is reset. Files with parse warnings are only rewritten with force.',
      inputSchema: {
        documentPath: z.string(),
        dryRun: z.boolean().optional(),
        ifMatch: z.string().optional(),
        force: z.boolean().optional(),
      },
      outputSchema: {
        etag: z.string(),
        changed: z.boolean(),
        text: z.string(),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ documentPath, dryRun, ifMatch, force }) => {
      const result = await formatBookmarksDoc(config, { documentPath, dryRun, ifMatch, force });
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
export async function runStdioServer(config: BookmarkViewConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
