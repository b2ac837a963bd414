import OpenAI from 'openai';
import { config } from '../config';
import type { ContentPart, ToolCall, Turn } from '../core/transcript';
import type { ToolDefinition } from '../tools/registry';

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ContentPartParam = OpenAI.Chat.ChatCompletionContentPart;
type ToolParam = OpenAI.Chat.ChatCompletionTool;
type WireToolCall = OpenAI.Chat.ChatCompletionMessageToolCall;

export interface ModelRequest {
  system: string;
  transcript: readonly Turn[];
  tools: ToolDefinition[];
  // generation sessions must answer with a tool call every turn
  requireToolCall: boolean;
  maxTokens: number;
}

export interface ModelResponse {
  text: string;
  toolCalls: ToolCall[];
}

/** Synchronous request/response access to a tool-calling model. */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelResponse>;
}

function toContentParts(parts: ContentPart[]): ContentPartParam[] {
  return parts.map((part) =>
    part.type === 'text'
      ? { type: 'text', text: part.text }
      : { type: 'image_url', image_url: { url: `data:${part.mediaType};base64,${part.data}` } }
  );
}

export function toWireMessages(system: string, transcript: readonly Turn[]): MessageParam[] {
  const messages: MessageParam[] = [{ role: 'system', content: system }];
  for (const turn of transcript) {
    switch (turn.role) {
      case 'user':
        messages.push({
          role: 'user',
          content: typeof turn.content === 'string' ? turn.content : toContentParts(turn.content)
        });
        break;
      case 'assistant':
        if (turn.toolCalls.length === 0) {
          messages.push({ role: 'assistant', content: turn.text });
        } else {
          messages.push({
            role: 'assistant',
            content: turn.text || null,
            tool_calls: turn.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: {
                name: call.name,
                arguments: typeof call.input === 'string' ? call.input : JSON.stringify(call.input ?? {})
              }
            }))
          });
        }
        break;
      case 'tool-result':
        for (const result of turn.results) {
          messages.push({ role: 'tool', tool_call_id: result.callId, content: result.content });
        }
        break;
    }
  }
  return messages;
}

export function toWireTools(tools: ToolDefinition[]): ToolParam[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: { name: tool.name, description: tool.description, parameters: tool.input_schema }
  }));
}

function parseArguments(raw: string): unknown {
  if (raw.trim() === '') return {};
  try {
    return JSON.parse(raw);
  } catch {
    // handed to the registry as-is; its validation reports the problem to the model
    return raw;
  }
}

export function fromWireToolCalls(calls: WireToolCall[] | undefined): ToolCall[] {
  if (!calls) return [];
  return calls
    .filter((call) => call.type === 'function')
    .map((call) => ({ id: call.id, name: call.function.name, input: parseArguments(call.function.arguments) }));
}

/** The slice of the OpenAI SDK the client calls. */
export interface ChatCompletions {
  create(params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
}

export class LLMClient implements ModelClient {
  private completions: ChatCompletions;
  private model: string;

  constructor(opts?: { completions?: ChatCompletions; model?: string }) {
    this.completions =
      opts?.completions ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl
      }).chat.completions;
    this.model = opts?.model ?? config.openaiModel;
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: 0,
      messages: toWireMessages(request.system, request.transcript)
    };
    if (request.tools.length > 0) {
      params.tools = toWireTools(request.tools);
      params.tool_choice = request.requireToolCall ? 'required' : 'auto';
    }
    const completion = await this.completions.create(params);

    const choice = completion.choices[0];
    if (!choice) {
      throw new Error('model returned no choices');
    }
    return {
      text: choice.message.content ?? '',
      toolCalls: fromWireToolCalls(choice.message.tool_calls)
    };
  }
}
