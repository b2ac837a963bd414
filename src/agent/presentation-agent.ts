import path from 'node:path';
import type { ProgressSink } from '../core/events';
import { Transcript } from '../core/transcript';
import type { Viewport } from '../export/rasterizer';
import type { ExportPipeline } from '../export/export-pipeline';
import { errorMessage, logger } from '../observability/logger';
import type { GenerationResult, PresentationBrief, PresentationGenerator } from '../tools/chat-tools';
import { createSlideTools } from '../tools/slide-tools';
import { failedTerminal, type TerminalResult } from '../tools/terminal';
import type { AgentLoop, AgentOutcome } from './agent-loop';
import { briefPrompt, generationSystemPrompt } from './prompts';

export type PresentationAgentOptions = {
  loop: AgentLoop;
  pipeline: ExportPipeline;
  workspaceDir: string;
  slidesDir: string;
  viewport: Viewport;
  maxIterations: number;
  maxTokens: number;
};

const log = logger.child('presentation');

function toTerminal(outcome: AgentOutcome): TerminalResult {
  switch (outcome.type) {
    case 'terminal':
      return outcome.result;
    case 'budget_exceeded':
      return failedTerminal('Max iterations reached without completion');
    case 'failed':
      return failedTerminal(`Generation failed: ${outcome.error}`);
    case 'reply':
      return failedTerminal(`Agent stopped without confirming completion: ${outcome.text}`);
  }
}

/**
 * Nested generation session: a fresh transcript seeded with the brief, the
 * slide tools, and an export of whatever the session reports as done.
 */
export class PresentationAgent implements PresentationGenerator {
  private opts: PresentationAgentOptions;

  constructor(opts: PresentationAgentOptions) {
    this.opts = opts;
  }

  async generate(brief: PresentationBrief, onProgress?: ProgressSink): Promise<GenerationResult> {
    try {
      const transcript = new Transcript();
      transcript.appendUser(briefPrompt(brief));
      log.info('generation start', { topic: brief.ppt_topic });

      const outcome = await this.opts.loop.run({
        system: generationSystemPrompt(this.opts.viewport, this.opts.slidesDir),
        transcript,
        registry: createSlideTools(this.opts.workspaceDir, this.opts.slidesDir),
        mode: 'generation',
        maxIterations: this.opts.maxIterations,
        maxTokens: this.opts.maxTokens,
        onProgress
      });
      const result = toTerminal(outcome);
      log.info('generation finished', {
        success: result.success,
        slides: result.slide_count,
        iterations: outcome.iterations
      });

      if (!result.success || result.slide_files.length === 0) {
        return result;
      }

      const exported = await this.opts.pipeline.export(result.slide_files, brief.ppt_topic, onProgress);
      if (!exported) {
        return result;
      }
      return {
        ...result,
        export_file: toWorkspacePath(this.opts.workspaceDir, exported.pptxFile),
        screenshots: exported.screenshots.map((p) => toWorkspacePath(this.opts.workspaceDir, p)),
        export_warnings: exported.warnings
      };
    } catch (err) {
      log.error('generation failed', { error: errorMessage(err) });
      return failedTerminal(`Error generating presentation: ${errorMessage(err)}`);
    }
  }
}

export function toWorkspacePath(workspaceDir: string, absPath: string): string {
  return path.relative(workspaceDir, absPath).split(path.sep).join('/');
}
