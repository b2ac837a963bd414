import type { ProgressSink, SessionKind } from '../core/events';
import type { Transcript } from '../core/transcript';
import type { ModelClient } from '../llm/llm-base';
import { errorMessage, logger, type Logger } from '../observability/logger';
import { toResultEntry, type ToolRegistry, type ToolResult } from '../tools/registry';
import { decodeTerminalResult, failedTerminal, type TerminalResult } from '../tools/terminal';

export type AgentOutcome =
  | { type: 'reply'; text: string; iterations: number }
  | { type: 'terminal'; result: TerminalResult; iterations: number }
  | { type: 'budget_exceeded'; iterations: number }
  | { type: 'failed'; error: string; iterations: number };

export interface AgentRunOptions<N extends string> {
  system: string;
  transcript: Transcript;
  registry: ToolRegistry<N>;
  // conversation ends on a plain reply, generation only on the completion tool
  mode: SessionKind;
  maxIterations: number;
  maxTokens: number;
  onProgress?: ProgressSink;
}

function resolveTerminal(result: ToolResult): TerminalResult | undefined {
  if (result.kind !== 'terminal') return undefined;
  const decoded = decodeTerminalResult(result.content);
  return decoded.ok ? decoded.result : failedTerminal(`Malformed completion payload: ${decoded.error}`);
}

/**
 * Alternates model requests and tool dispatch over one transcript until the
 * model replies (conversation), reports completion (generation), or the
 * iteration budget runs out. Never throws.
 */
export class AgentLoop {
  private readonly model: ModelClient;
  private readonly log: Logger;

  constructor(model: ModelClient, log: Logger = logger.child('agent-loop')) {
    this.model = model;
    this.log = log;
  }

  async run<N extends string>(opts: AgentRunOptions<N>): Promise<AgentOutcome> {
    const { transcript, registry, mode } = opts;
    const tools = registry.definitions();
    let iteration = 0;

    try {
      while (iteration < opts.maxIterations) {
        iteration += 1;
        this.log.debug('iteration start', { mode, iteration, turns: transcript.length });

        const response = await this.model.complete({
          system: opts.system,
          transcript: transcript.list(),
          tools,
          requireToolCall: mode === 'generation',
          maxTokens: opts.maxTokens
        });

        if (response.toolCalls.length === 0) {
          transcript.appendReply(response.text);
          if (mode === 'conversation') {
            return { type: 'reply', text: response.text, iterations: iteration };
          }
          this.log.warn('agent finished without reporting a result', { iteration });
          return {
            type: 'terminal',
            result: failedTerminal(`Agent stopped without confirming completion: ${response.text}`),
            iterations: iteration
          };
        }

        const results: ToolResult[] = [];
        let terminal: TerminalResult | undefined;
        for (const call of response.toolCalls) {
          const result = await registry.dispatch(call);
          results.push(result);
          this.log.info('tool dispatched', {
            mode,
            iteration,
            tool: call.name,
            call_id: call.id,
            is_error: result.isError,
            preview: result.content.slice(0, 200)
          });
          opts.onProgress?.({
            kind: 'tool_dispatched',
            data: { session: mode, tool: call.name, call_id: call.id, iteration, is_error: result.isError }
          });
          // first completion wins; later calls in the round still run for their side effects
          terminal = terminal ?? resolveTerminal(result);
        }

        transcript.appendToolRound(response.text, response.toolCalls, results.map(toResultEntry));

        if (terminal) {
          return { type: 'terminal', result: terminal, iterations: iteration };
        }
      }

      this.log.warn('iteration budget exhausted', { mode, max_iterations: opts.maxIterations });
      return { type: 'budget_exceeded', iterations: iteration };
    } catch (err) {
      this.log.error('agent loop failed', { mode, iteration, error: errorMessage(err) });
      return { type: 'failed', error: errorMessage(err), iterations: iteration };
    }
  }
}
