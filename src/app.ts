import fs from 'node:fs/promises';
import path from 'node:path';
import { AgentLoop } from './agent/agent-loop';
import { ChatAgent } from './agent/chat-agent';
import { ChatService } from './agent/chat-service';
import { PresentationAgent } from './agent/presentation-agent';
import { config as defaultConfig, type Config } from './config';
import { InMemorySessionStore, type SessionStore } from './core/session-store';
import { PptxDeckAssembler } from './export/deck-assembler';
import { ExportPipeline } from './export/export-pipeline';
import { ChromiumRasterizer } from './export/rasterizer';
import { LLMClient, type ModelClient } from './llm/llm-base';

export type AppOverrides = {
  model?: ModelClient;
  store?: SessionStore;
};

export type App = {
  config: Config;
  service: ChatService;
};

export async function ensureWorkspaceDirs(cfg: Config = defaultConfig) {
  for (const dir of [path.join(cfg.workspaceDir, cfg.slidesDir), cfg.screenshotsDir, cfg.exportsDir, cfg.uploadsDir]) {
    await fs.mkdir(dir, { recursive: true });
  }
}

/** Wires the conversation and generation sessions over one model client. */
export function createApp(cfg: Config = defaultConfig, overrides: AppOverrides = {}): App {
  const model = overrides.model ?? new LLMClient({ model: cfg.openaiModel });
  const loop = new AgentLoop(model);
  const viewport = { width: cfg.slideWidth, height: cfg.slideHeight };

  const pipeline = new ExportPipeline({
    rasterizer: new ChromiumRasterizer({ executablePath: cfg.chromiumPath, settleMs: cfg.renderSettleMs }),
    assembler: new PptxDeckAssembler(),
    workspaceDir: cfg.workspaceDir,
    screenshotsDir: cfg.screenshotsDir,
    exportsDir: cfg.exportsDir,
    viewport
  });

  const presentations = new PresentationAgent({
    loop,
    pipeline,
    workspaceDir: cfg.workspaceDir,
    slidesDir: cfg.slidesDir,
    viewport,
    maxIterations: cfg.generationMaxIterations,
    maxTokens: cfg.generationMaxTokens
  });

  const agent = new ChatAgent({
    loop,
    presentations,
    maxIterations: cfg.chatMaxIterations,
    maxTokens: cfg.chatMaxTokens
  });

  const service = new ChatService({
    store: overrides.store ?? new InMemorySessionStore(),
    agent,
    keepaliveMs: cfg.streamKeepaliveMs,
    staleMs: cfg.streamStaleMs
  });

  return { config: cfg, service };
}
