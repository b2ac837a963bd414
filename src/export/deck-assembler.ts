import fs from 'node:fs/promises';
import pptxgen from 'pptxgenjs';
import { errorMessage, logger } from '../observability/logger';

export type AssembleOptions = {
  title: string;
  onSlideAdded?: (slideNumber: number, totalSlides: number) => void;
};

export interface DeckAssembler {
  /** Writes one full-bleed slide per readable image; resolves the number of slides written. */
  assemble(imagePaths: string[], outputPath: string, opts: AssembleOptions): Promise<number>;
}

// LAYOUT_16x9 is 10in x 5.625in
const SLIDE_W_IN = 10;
const SLIDE_H_IN = 5.625;

const log = logger.child('assembler');

export class PptxDeckAssembler implements DeckAssembler {
  async assemble(imagePaths: string[], outputPath: string, opts: AssembleOptions): Promise<number> {
    const pres = new pptxgen();
    pres.layout = 'LAYOUT_16x9';
    pres.title = opts.title;

    let added = 0;
    for (const [i, imagePath] of imagePaths.entries()) {
      let data: Buffer;
      try {
        data = await fs.readFile(imagePath);
      } catch (err) {
        log.warn('image not readable, slide skipped', { slide: i + 1, path: imagePath, error: errorMessage(err) });
        continue;
      }
      const slide = pres.addSlide();
      slide.addImage({
        data: `image/png;base64,${data.toString('base64')}`,
        x: 0,
        y: 0,
        w: SLIDE_W_IN,
        h: SLIDE_H_IN
      });
      added += 1;
      opts.onSlideAdded?.(i + 1, imagePaths.length);
    }

    if (added === 0) {
      log.warn('no readable images, deck not written', { path: outputPath });
      return 0;
    }

    const out = await pres.write({ outputType: 'nodebuffer' });
    if (!Buffer.isBuffer(out)) {
      throw new Error('pptx writer did not produce a buffer');
    }
    await fs.writeFile(outputPath, out);
    log.info('deck written', { path: outputPath, slides: added, kb: Number((out.length / 1024).toFixed(1)) });
    return added;
  }
}
