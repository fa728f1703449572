/**
 * MCP Server initialization and tool registration
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest
} from '@modelcontextprotocol/sdk/types.js';
import { mergeTools } from './tools/merge.js';

type ToolName = keyof typeof mergeTools;

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(mergeTools, name);
}

/**
 * Dispatch a tool call and wrap the outcome as MCP text content
 */
export async function callTool(name: string, args: unknown): Promise<ToolResponse> {
  if (!isToolName(name)) {
    throw new Error(`Unknown tool: ${name}`);
  }

  try {
    const result = await mergeTools[name].handler(args ?? {});
    return {
      content: [
        {
          type: 'text',
          text: result
        }
      ]
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${message}`
        }
      ],
      isError: true
    };
  }
}

/**
 * Create and configure MCP server with all tools
 */
export function createServer(): Server {
  const server = new Server(
    {
      name: 'esp32-merge-hook',
      version: '1.0.0'
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const toolsList = Object.entries(mergeTools).map(([name, tool]) => ({
      name,
      description: tool.description,
      inputSchema: tool.inputSchema
    }));

    return { tools: toolsList };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) =>
    callTool(request.params.name, request.params.arguments)
  );

  return server;
}

/**
 * Start the MCP server
 */
export async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);

  console.error('ESP32 Merge MCP Server running on stdio');
  console.error(`Available tools: ${Object.keys(mergeTools).length} (${Object.keys(mergeTools).join(', ')})`);
}
