import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { ChatOutcome, ChatRequest, ChatTurnRunner } from '../src/agent/chat-agent';
import type { ProgressSink } from '../src/core/events';
import type { ToolCall, Transcript } from '../src/core/transcript';
import type { AssembleOptions, DeckAssembler } from '../src/export/deck-assembler';
import type { RenderSurface, SlideRasterizer, Viewport } from '../src/export/rasterizer';
import type { ModelClient, ModelRequest, ModelResponse } from '../src/llm/llm-base';
import type { GenerationResult, PresentationBrief, PresentationGenerator } from '../src/tools/chat-tools';

export type ScriptStep = ModelResponse | Error;

/** Model client that answers from a fixed script and records every request. */
export class ScriptedModel implements ModelClient {
  requests: ModelRequest[] = [];
  private steps: ScriptStep[];
  private fallback?: ScriptStep;

  constructor(steps: ScriptStep[], fallback?: ScriptStep) {
    this.steps = steps.slice();
    this.fallback = fallback;
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push({ ...request, transcript: request.transcript.slice() });
    const step = this.steps.shift() ?? this.fallback;
    if (!step) throw new Error('script exhausted');
    if (step instanceof Error) throw step;
    return step;
  }
}

export function reply(text: string): ModelResponse {
  return { text, toolCalls: [] };
}

export function toolCalls(...calls: ToolCall[]): ModelResponse {
  return { text: '', toolCalls: calls };
}

export function call(id: string, name: string, input: unknown = {}): ToolCall {
  return { id, name, input };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'slidesmith-test-'));
}

export async function removeDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Writes `png:<document path>` per capture, optionally after `delayMs`;
 * documents named in `failOn` throw.
 */
export class FakeRasterizer implements SlideRasterizer {
  viewports: Viewport[] = [];
  captured: string[] = [];
  closed = 0;
  private failOn: string[];
  private openError?: Error;
  private delayMs: number;

  constructor(opts: { failOn?: string[]; openError?: Error; delayMs?: number } = {}) {
    this.failOn = opts.failOn ?? [];
    this.openError = opts.openError;
    this.delayMs = opts.delayMs ?? 0;
  }

  async open(viewport: Viewport): Promise<RenderSurface> {
    if (this.openError) throw this.openError;
    this.viewports.push(viewport);
    return {
      capture: async (documentPath, imagePath) => {
        if (this.failOn.includes(path.basename(documentPath))) throw new Error('render crashed');
        if (this.delayMs > 0) await sleep(this.delayMs);
        await fs.writeFile(imagePath, `png:${documentPath}`);
        this.captured.push(documentPath);
      },
      close: async () => {
        this.closed += 1;
      }
    };
  }
}

/** Records each call with the contents of the images it was handed. */
export class FakeAssembler implements DeckAssembler {
  calls: Array<{ imagePaths: string[]; outputPath: string; title: string }> = [];
  images: string[][] = [];
  private error?: Error;

  constructor(error?: Error) {
    this.error = error;
  }

  async assemble(imagePaths: string[], outputPath: string, opts: AssembleOptions): Promise<number> {
    if (this.error) throw this.error;
    this.calls.push({ imagePaths, outputPath, title: opts.title });
    this.images.push(await Promise.all(imagePaths.map((p) => fs.readFile(p, 'utf8'))));
    imagePaths.forEach((_, i) => opts.onSlideAdded?.(i + 1, imagePaths.length));
    await fs.writeFile(outputPath, 'deck');
    return imagePaths.length;
  }
}

/** Creates the workspace folders the export writes into. */
export async function makeWorkspace(): Promise<string> {
  const dir = await makeTempDir();
  await fs.mkdir(path.join(dir, 'slides'));
  await fs.mkdir(path.join(dir, 'screenshots'));
  await fs.mkdir(path.join(dir, 'exports'));
  await fs.mkdir(path.join(dir, 'uploads'));
  return dir;
}

/** Returns a fixed result and reports one assembly step through the sink it was given. */
export class FakeGenerator implements PresentationGenerator {
  briefs: PresentationBrief[] = [];
  private result: GenerationResult;

  constructor(result: GenerationResult) {
    this.result = result;
  }

  async generate(brief: PresentationBrief, onProgress?: ProgressSink): Promise<GenerationResult> {
    this.briefs.push(brief);
    onProgress?.({ kind: 'assembly_progress', data: { slide_number: 1, total_slides: 1 } });
    return this.result;
  }
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type FakeRunnerOptions = {
  events?: number;
  delayMs?: number;
  outcome?: ChatOutcome;
  error?: Error;
};

/**
 * Conversation turn stand-in: appends the user message, reports `events`
 * tool dispatches, then answers with `outcome` (a "done" reply by default).
 */
export class FakeRunner implements ChatTurnRunner {
  seenTurns: number[] = [];
  requests: ChatRequest[] = [];
  private opts: FakeRunnerOptions;

  constructor(opts: FakeRunnerOptions = {}) {
    this.opts = opts;
  }

  async send(transcript: Transcript, request: ChatRequest, onProgress?: ProgressSink): Promise<ChatOutcome> {
    this.seenTurns.push(transcript.length);
    this.requests.push(request);
    transcript.appendUser(request.message);
    for (let i = 1; i <= (this.opts.events ?? 0); i++) {
      onProgress?.({
        kind: 'tool_dispatched',
        data: { session: 'conversation', tool: 'generate_presentation', call_id: `c${i}`, iteration: i, is_error: false }
      });
    }
    if (this.opts.delayMs) await sleep(this.opts.delayMs);
    if (this.opts.error) throw this.opts.error;
    const outcome: ChatOutcome = this.opts.outcome ?? { ok: true, text: 'done', exportFile: null };
    if (outcome.ok) transcript.appendReply(outcome.text);
    return outcome;
  }
}
