#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { renderDocument } from './core/router.js';
import { describeFailure, type RenderFailure } from './core/format.js';

/**
 * MCP Server for Mermaid diagram generation
 * Provides a tool that renders JSON diagram documents to Mermaid text
 */

// Input schemas using Zod
const RenderDiagramSchema = z.object({
  document: z.record(z.unknown()).describe('Diagram document: { type, config?, nodes, edges }'),
});

/**
 * Format render failures for display
 */
function formatFailures(failures: RenderFailure[]): string {
  return failures
    .map((f) => {
      const at = f.path ? ` (at ${f.path})` : '';
      const hint = f.hint ? `\nhint: ${f.hint}` : '';
      return `[ERROR] ${f.code}: ${f.message}${at}${hint}`;
    })
    .join('\n');
}

/**
 * Start the MCP server
 */
async function startServer() {
  const server = new Server(
    {
      name: 'mermaid-graph-builder',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool handlers
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'render_mermaid_diagram',
        description:
          'Generate Mermaid text from a structured diagram document instead of writing Mermaid by hand. ' +
          'Supports flowchart, class and er (entity-relationship) documents. Nodes are declared with a unique key ' +
          'and a label; edges refer to node keys with "from" and "to". A flowchart node lists earlier node keys in ' +
          '"subnodes" to become a subgraph. Returns the Mermaid source, or the ' +
          'validation errors that stopped the document from building.',
        inputSchema: {
          type: 'object',
          properties: {
            document: {
              type: 'object',
              description:
                'Diagram document, e.g. {"type":"flowchart","nodes":[{"key":"a","label":"Start"},{"key":"b","label":"End"}],' +
                '"edges":[{"from":"a","to":"b","arrow":"normal"}]}',
            },
          },
          required: ['document'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (name === 'render_mermaid_diagram') {
        const parsed = RenderDiagramSchema.parse(args);

        let text: string;
        try {
          text = renderDocument(parsed.document);
        } catch (error) {
          return {
            content: [{ type: 'text', text: formatFailures(describeFailure(error)) }],
            isError: true,
          };
        }

        return {
          content: [{ type: 'text', text }],
        };
      }

      throw new Error(`Unknown tool: ${name}`);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      throw error;
    }
  });

  // Start server with stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr to avoid interfering with stdio transport
  console.error('Mermaid graph builder MCP server started');
}

// Start the server
startServer().catch((error: unknown) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
