import path from 'node:path';

export type Config = {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  chatMaxTokens: number;
  generationMaxTokens: number;
  // iteration budgets, one per session kind
  chatMaxIterations: number;
  generationMaxIterations: number;
  workspaceDir: string;
  slidesDir: string;
  screenshotsDir: string;
  exportsDir: string;
  // reference images network clients upload; they may not name files elsewhere
  uploadsDir: string;
  maxUploadBytes: number;
  // viewport the slide documents are authored against
  slideWidth: number;
  slideHeight: number;
  renderSettleMs: number;
  chromiumPath?: string;
  streamKeepaliveMs: number;
  streamStaleMs: number;
  port: number;
  host: string;
};

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

const workspaceDir = path.resolve(process.env.WORKSPACE_DIR ?? process.cwd());

// Every value can be overridden via env.
export const config: Config = {
  openaiApiKey: process.env.OPENAI_API_KEY,
  openaiBaseUrl: process.env.OPENAI_BASE_URL,
  openaiModel: process.env.OPENAI_MODEL ?? 'gpt-4.1',
  chatMaxTokens: intFromEnv('CHAT_MAX_TOKENS', 16000),
  generationMaxTokens: intFromEnv('GENERATION_MAX_TOKENS', 4000),
  chatMaxIterations: intFromEnv('CHAT_MAX_ITERATIONS', 10),
  generationMaxIterations: intFromEnv('GENERATION_MAX_ITERATIONS', 30),
  workspaceDir,
  slidesDir: 'slides',
  screenshotsDir: path.join(workspaceDir, 'screenshots'),
  exportsDir: path.join(workspaceDir, 'exports'),
  uploadsDir: path.join(workspaceDir, 'uploads'),
  maxUploadBytes: intFromEnv('MAX_UPLOAD_BYTES', 16 * 1024 * 1024),
  slideWidth: intFromEnv('SLIDE_WIDTH', 1920),
  slideHeight: intFromEnv('SLIDE_HEIGHT', 1080),
  renderSettleMs: intFromEnv('RENDER_SETTLE_MS', 500),
  chromiumPath: process.env.CHROMIUM_PATH,
  streamKeepaliveMs: intFromEnv('STREAM_KEEPALIVE_MS', 15000),
  streamStaleMs: intFromEnv('STREAM_STALE_MS', 5000),
  port: intFromEnv('PORT', 5000),
  host: process.env.HOST ?? '0.0.0.0'
};
