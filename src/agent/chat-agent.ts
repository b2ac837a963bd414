import type { ProgressSink } from '../core/events';
import type { Transcript } from '../core/transcript';
import { buildUserContent } from '../llm/images';
import { errorMessage, logger } from '../observability/logger';
import { createChatTools, type GenerationResult, type PresentationGenerator } from '../tools/chat-tools';
import type { AgentLoop } from './agent-loop';
import { chatSystemPrompt } from './prompts';

export type ChatRequest = {
  message: string;
  // paths of reference images attached to this message
  images?: string[];
};

export type ChatOutcome = { ok: true; text: string; exportFile: string | null } | { ok: false; error: string };

/** One conversation turn over a transcript the caller owns. */
export interface ChatTurnRunner {
  send(transcript: Transcript, request: ChatRequest, onProgress?: ProgressSink): Promise<ChatOutcome>;
}

export type ChatAgentOptions = {
  loop: AgentLoop;
  presentations: PresentationGenerator;
  maxIterations: number;
  maxTokens: number;
};

export const BUDGET_APOLOGY = 'Sorry, I encountered an issue. Please try again.';

const log = logger.child('chat');

export class ChatAgent implements ChatTurnRunner {
  private opts: ChatAgentOptions;

  constructor(opts: ChatAgentOptions) {
    this.opts = opts;
  }

  async send(transcript: Transcript, request: ChatRequest, onProgress?: ProgressSink): Promise<ChatOutcome> {
    try {
      transcript.appendUser(await buildUserContent(request.message, request.images));

      const generated: { latest: GenerationResult | null } = { latest: null };
      const registry = createChatTools({
        presentations: this.opts.presentations,
        onProgress,
        onGenerated: (result) => {
          generated.latest = result;
        }
      });

      const outcome = await this.opts.loop.run({
        system: chatSystemPrompt(),
        transcript,
        registry,
        mode: 'conversation',
        maxIterations: this.opts.maxIterations,
        maxTokens: this.opts.maxTokens,
        onProgress
      });
      const exportFile = generated.latest?.export_file ?? null;

      switch (outcome.type) {
        case 'reply':
          return { ok: true, text: outcome.text, exportFile };
        case 'terminal':
          return { ok: true, text: outcome.result.message, exportFile };
        case 'budget_exceeded':
          log.warn('conversation budget exhausted', { iterations: outcome.iterations });
          return { ok: true, text: BUDGET_APOLOGY, exportFile };
        case 'failed':
          return { ok: false, error: outcome.error };
      }
    } catch (err) {
      log.error('chat turn failed', { error: errorMessage(err) });
      return { ok: false, error: errorMessage(err) };
    }
  }
}
