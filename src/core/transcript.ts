export type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

export type TextPart = { type: 'text'; text: string };
export type ImagePart = { type: 'image'; mediaType: ImageMediaType; data: string };
export type ContentPart = TextPart | ImagePart;

export interface ToolCall {
  id: string;
  name: string;
  // raw model input; validated by the registry, never by the loop
  input: unknown;
}

export interface ToolResultEntry {
  callId: string;
  name: string;
  content: string;
  isError: boolean;
}

export type UserTurn = { role: 'user'; content: string | ContentPart[] };
export type AssistantTurn = { role: 'assistant'; text: string; toolCalls: ToolCall[] };
export type ToolResultTurn = { role: 'tool-result'; results: ToolResultEntry[] };
export type Turn = UserTurn | AssistantTurn | ToolResultTurn;

export class TranscriptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptError';
  }
}

/**
 * Ordered turn history of one session. Tool rounds go in atomically so a
 * `tool-result` turn always sits right behind the assistant turn that asked
 * for it, with one entry per call id in call order.
 */
export class Transcript {
  private turns: Turn[];

  constructor(turns: Turn[] = []) {
    this.turns = turns.slice();
  }

  get length(): number {
    return this.turns.length;
  }

  list(): readonly Turn[] {
    return this.turns;
  }

  last(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }

  appendUser(content: string | ContentPart[]) {
    this.turns.push({ role: 'user', content });
  }

  appendReply(text: string) {
    this.turns.push({ role: 'assistant', text, toolCalls: [] });
  }

  appendToolRound(text: string, toolCalls: ToolCall[], results: ToolResultEntry[]) {
    if (toolCalls.length === 0) {
      throw new TranscriptError('tool round without tool calls');
    }
    if (toolCalls.length !== results.length) {
      throw new TranscriptError(`expected ${toolCalls.length} tool results, got ${results.length}`);
    }
    const seen = new Set<string>();
    toolCalls.forEach((call, i) => {
      if (seen.has(call.id)) {
        throw new TranscriptError(`duplicate tool call id: ${call.id}`);
      }
      seen.add(call.id);
      if (results[i].callId !== call.id) {
        throw new TranscriptError(`tool result ${i} answers ${results[i].callId}, expected ${call.id}`);
      }
    });
    this.turns.push({ role: 'assistant', text, toolCalls: toolCalls.slice() });
    this.turns.push({ role: 'tool-result', results: results.slice() });
  }

  /** Independent copy; turns are never mutated in place, so sharing them is safe. */
  fork(): Transcript {
    return new Transcript(this.turns);
  }
}
