/**
 * In-memory registry of named tools over the Salesforce record client.
 *
 * Each tool pairs a zod input schema with a handler that calls one public
 * RecordClient method. Input is parsed before the handler runs, so a
 * handler only ever sees well-formed input.
 */

import type { z, ZodError } from 'zod';

import { NotFoundError, ValidationError } from '../../shared/errors';
import type { RecordClient } from '../salesforce/record-client';

// === Exported interfaces ===

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: S;
  handler: (client: RecordClient, input: z.infer<S>) => Promise<unknown>;
}

/** A tool with its input type erased behind parsing. */
export interface Tool {
  name: string;
  description: string;
  run(client: RecordClient, rawInput: unknown): Promise<unknown>;
}

export interface ToolSummary {
  name: string;
  description: string;
}

export interface IToolRegistry {
  listTools(): ToolSummary[];
  invoke(name: string, rawInput: unknown): Promise<unknown>;
}

function formatZodErrors(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'input';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): Tool {
  return {
    name: definition.name,
    description: definition.description,
    async run(client, rawInput) {
      const parsed = definition.inputSchema.safeParse(rawInput);
      if (!parsed.success) {
        throw new ValidationError(formatZodErrors(parsed.error));
      }
      return definition.handler(client, parsed.data);
    },
  };
}

// === Tool Registry implementation ===

export class ToolRegistry implements IToolRegistry {
  private readonly tools: Map<string, Tool>;

  constructor(
    private readonly client: RecordClient,
    definitions: Tool[],
  ) {
    this.tools = new Map();

    for (const tool of definitions) {
      if (this.tools.has(tool.name)) {
        throw new ValidationError(`Duplicate tool name: "${tool.name}"`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  listTools(): ToolSummary[] {
    return Array.from(this.tools.values(), ({ name, description }) => ({ name, description }));
  }

  async invoke(name: string, rawInput: unknown): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new NotFoundError(`Unknown tool: ${name}`);
    }
    return tool.run(this.client, rawInput);
  }
}
