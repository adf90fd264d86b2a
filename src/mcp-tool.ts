// Tool handler for the MCP server, kept out of the entry point so it can be called directly

import { z } from 'zod';
import { fromValueRange, type Diagnostic } from './core/format.js';
import { createGenerator } from './generators/index.js';

// Pattern-specific fields pass through and are validated by createGenerator
const GenerateArrowSchema = z
  .object({
    pattern: z.string().describe('One of the arrow patterns'),
    uniqueId: z.union([z.boolean(), z.string()]).optional().describe('Suffix internal ids; true picks a random suffix'),
  })
  .passthrough();

export interface GenerateArrowResult {
  svg: string;
  warnings: Diagnostic[];
}

/**
 * Render one arrow and report clamp warnings alongside the markup
 */
export function generateArrow(args: unknown): GenerateArrowResult {
  const { uniqueId, ...config } = GenerateArrowSchema.parse(args);
  const generator = createGenerator(config);
  return { svg: generator.generate(uniqueId), warnings: generator.warnings.map(fromValueRange) };
}
