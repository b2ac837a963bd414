import fs from 'node:fs/promises';
import path from 'node:path';
import type { ProgressSink } from '../core/events';
import { errorMessage, logger } from '../observability/logger';
import type { DeckAssembler } from './deck-assembler';
import type { RenderSurface, SlideRasterizer, Viewport } from './rasterizer';

export type ExportPipelineOptions = {
  rasterizer: SlideRasterizer;
  assembler: DeckAssembler;
  workspaceDir: string;
  screenshotsDir: string;
  exportsDir: string;
  viewport: Viewport;
};

export interface ExportResult {
  pptxFile: string;
  screenshots: string[];
  slideCount: number;
  warnings: string[];
}

type RasterizeOutcome = { screenshots: string[]; warnings: string[] };

const log = logger.child('export');

export function sanitizeTitle(title: string): string {
  const name = title
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}._-]/gu, '')
    .replace(/^\.+/, '');
  return name || 'presentation';
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Slide documents → screenshots → one .pptx deck. Missing or failing items
 * are skipped; any other failure means "no deck", never an exception.
 */
export class ExportPipeline {
  private opts: ExportPipelineOptions;

  constructor(opts: ExportPipelineOptions) {
    this.opts = opts;
  }

  outputPathFor(title: string): string {
    return path.join(this.opts.exportsDir, `${sanitizeTitle(title)}.pptx`);
  }

  async export(documentPaths: string[], title: string, onProgress?: ProgressSink): Promise<ExportResult | null> {
    try {
      log.info('export start', { title, documents: documentPaths.length });
      const { screenshots, warnings } = await this.rasterize(documentPaths, title, onProgress);
      if (screenshots.length === 0) {
        log.warn('no screenshots captured, export skipped', { title });
        return null;
      }

      const pptxFile = this.outputPathFor(title);
      const slideCount = await this.opts.assembler.assemble(screenshots, pptxFile, {
        title,
        onSlideAdded: (slideNumber, totalSlides) =>
          onProgress?.({ kind: 'assembly_progress', data: { slide_number: slideNumber, total_slides: totalSlides } })
      });
      if (slideCount === 0) {
        return null;
      }
      log.info('export done', { pptx: pptxFile, slides: slideCount, warnings: warnings.length });
      return { pptxFile, screenshots, slideCount, warnings };
    } catch (err) {
      log.error('export failed', { title, error: errorMessage(err) });
      return null;
    }
  }

  private makeCaptureDir(title: string): Promise<string> {
    return fs.mkdtemp(path.join(this.opts.screenshotsDir, `${sanitizeTitle(title)}-`));
  }

  private async rasterize(documentPaths: string[], title: string, onProgress?: ProgressSink): Promise<RasterizeOutcome> {
    const screenshots: string[] = [];
    const warnings: string[] = [];
    let surface: RenderSurface | null = null;
    // one capture folder per export; concurrent exports never share images
    let captureDir: string | null = null;

    try {
      for (const [i, documentPath] of documentPaths.entries()) {
        const slideNumber = i + 1;
        const absDocument = path.resolve(this.opts.workspaceDir, documentPath);
        if (!(await fileExists(absDocument))) {
          const warning = `Slide not found: ${documentPath}`;
          log.warn(warning);
          warnings.push(warning);
          continue;
        }

        captureDir = captureDir ?? (await this.makeCaptureDir(title));
        surface = surface ?? (await this.opts.rasterizer.open(this.opts.viewport));
        const filename = `slide_${slideNumber}.png`;
        const imagePath = path.join(captureDir, filename);
        try {
          await surface.capture(absDocument, imagePath);
        } catch (err) {
          const warning = `Error capturing ${documentPath}: ${errorMessage(err)}`;
          log.warn(warning);
          warnings.push(warning);
          continue;
        }
        screenshots.push(imagePath);
        log.info('captured', { filename });
        onProgress?.({
          kind: 'rasterization_progress',
          data: { slide_number: slideNumber, total_slides: documentPaths.length, filename }
        });
      }
    } finally {
      if (surface) {
        await surface.close().catch((err: unknown) => log.warn('renderer close failed', { error: errorMessage(err) }));
      }
    }
    return { screenshots, warnings };
  }
}
