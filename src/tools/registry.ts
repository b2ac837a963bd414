import type { z } from 'zod';
import type { ToolCall, ToolResultEntry } from '../core/transcript';
import { errorMessage } from '../observability/logger';

type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'array';
  description?: string;
  items?: { type: 'string' };
};

export type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

/** Catalog entry sent to the model. */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: JsonSchemaObject;
}

export type ToolOutput = { kind: 'text'; content: string; isError: boolean } | { kind: 'terminal'; content: string };

export type ToolResult =
  | { kind: 'text'; callId: string; name: string; content: string; isError: boolean }
  | { kind: 'terminal'; callId: string; name: string; content: string; isError: false };

export interface ToolSpec<N extends string, S extends z.ZodTypeAny> {
  name: N;
  description: string;
  inputSchema: JsonSchemaObject;
  input: S;
  // plain strings starting with "Error" are flagged as errors
  handler: (input: z.output<S>) => Promise<ToolOutput | string>;
}

type Entry = {
  definition: ToolDefinition;
  run: (input: unknown) => Promise<ToolOutput>;
};

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function textOutput(content: string): ToolOutput {
  return { kind: 'text', content, isError: content.startsWith('Error') };
}

/**
 * Closed catalog of tools keyed by `N`. `dispatch` is total: unknown names,
 * invalid input and handler failures all come back as error-flagged results.
 */
export class ToolRegistry<N extends string = string> {
  private tools = new Map<string, Entry>();

  register<S extends z.ZodTypeAny>(tool: ToolSpec<N, S>): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    const run = async (input: unknown): Promise<ToolOutput> => {
      const parsed = tool.input.safeParse(input);
      if (!parsed.success) {
        return { kind: 'text', content: `Error: invalid input for ${tool.name}: ${formatIssues(parsed.error)}`, isError: true };
      }
      const out = await tool.handler(parsed.data);
      return typeof out === 'string' ? textOutput(out) : out;
    };
    this.tools.set(tool.name, {
      definition: { name: tool.name, description: tool.description, input_schema: tool.inputSchema },
      run
    });
    return this;
  }

  has(name: string): name is N {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  async dispatch(call: ToolCall): Promise<ToolResult> {
    const entry = this.tools.get(call.name);
    if (!entry) {
      return {
        kind: 'text',
        callId: call.id,
        name: call.name,
        content: `Error: Unknown tool '${call.name}'. Available tools: ${this.names().join(', ')}`,
        isError: true
      };
    }
    try {
      const out = await entry.run(call.input);
      if (out.kind === 'terminal') {
        return { kind: 'terminal', callId: call.id, name: call.name, content: out.content, isError: false };
      }
      return { kind: 'text', callId: call.id, name: call.name, content: out.content, isError: out.isError };
    } catch (err) {
      return {
        kind: 'text',
        callId: call.id,
        name: call.name,
        content: `Error executing ${call.name}: ${errorMessage(err)}`,
        isError: true
      };
    }
  }
}

export function toResultEntry(result: ToolResult): ToolResultEntry {
  return { callId: result.callId, name: result.name, content: result.content, isError: result.isError };
}
