#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { PATTERNS } from './core/config.js';
import { isArrowError } from './core/errors.js';
import { generateArrow } from './mcp-tool.js';

/**
 * MCP server exposing the arrow generators as a single tool.
 */

async function startServer() {
  const server = new Server(
    {
      name: 'arrow-anim',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'generate_arrow',
        description:
          'Generate a self-contained animated SVG arrow. Flow patterns move along one direction ' +
          '(up, down, left, right); spread patterns move two mirrored groups apart (horizontal, vertical). ' +
          'Out-of-range numbers are clamped and reported as warnings.',
        inputSchema: {
          type: 'object',
          properties: {
            pattern: { type: 'string', enum: [...PATTERNS] },
            color: { type: 'string', description: 'Stroke color, e.g. #2563eb' },
            direction: { type: 'string' },
            width: { type: 'integer' },
            height: { type: 'integer' },
            strokeWidth: { type: 'integer' },
            numArrows: { type: 'integer' },
            speedInPxPerSecond: { type: ['number', 'null'] },
            speedInDurationSeconds: { type: ['number', 'null'] },
            animation: { type: 'string', description: 'CSS easing (moving-flow, bouncing-spread)' },
            spotlightSize: { type: 'number' },
            pathExtensionFactor: { type: 'number' },
            dimOpacity: { type: 'number' },
            centerGapRatio: { type: 'number' },
            uniqueId: { type: ['boolean', 'string'] },
          },
          required: ['pattern'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (name === 'generate_arrow') {
        const result = generateArrow(args);
        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      }

      throw new Error(`Unknown tool: ${name}`);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      if (isArrowError(error)) {
        throw new Error(`${error.code}: ${error.message}`);
      }
      throw error;
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout belongs to the transport
  console.error('arrow-anim MCP server started');
}

startServer().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
