import { pathToFileURL } from 'node:url';
import type { Browser } from 'playwright-core';
import { logger } from '../observability/logger';

export type Viewport = { width: number; height: number };

/** An open rendering context; each capture gets its own fixed-size page. */
export interface RenderSurface {
  capture(documentPath: string, imagePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface SlideRasterizer {
  open(viewport: Viewport): Promise<RenderSurface>;
}

export type ChromiumRasterizerOptions = {
  executablePath?: string;
  settleMs?: number;
};

const log = logger.child('rasterizer');

/** Headless Chromium through playwright-core; the browser binary comes from the host. */
export class ChromiumRasterizer implements SlideRasterizer {
  private executablePath?: string;
  private settleMs: number;

  constructor(opts: ChromiumRasterizerOptions = {}) {
    this.executablePath = opts.executablePath;
    this.settleMs = opts.settleMs ?? 500;
  }

  async open(viewport: Viewport): Promise<RenderSurface> {
    const { chromium } = await import('playwright-core');
    log.info('launching browser', { executable: this.executablePath ?? '(bundled)', ...viewport });
    const browser: Browser = await chromium.launch({
      headless: true,
      executablePath: this.executablePath,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu']
    });

    return {
      capture: async (documentPath, imagePath) => {
        const page = await browser.newPage({ viewport });
        try {
          await page.goto(pathToFileURL(documentPath).href, { waitUntil: 'networkidle' });
          // fonts and CDN styles settle after network idle
          await page.waitForTimeout(this.settleMs);
          await page.screenshot({ path: imagePath, fullPage: false });
        } finally {
          await page.close();
        }
      },
      close: async () => {
        await browser.close();
      }
    };
  }
}
