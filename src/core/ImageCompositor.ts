import sharp from 'sharp';
import fs from 'fs-extra';
import path from 'path';
import { BackgroundColor, CanvasConfig } from '../types/config';
import { Trait, TraitCombination, isTrait } from '../types/traits';
import logger from '../utils/logger';

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

export function toSharpColor(color: BackgroundColor): sharp.Color {
  if (typeof color === 'string') {
    return color;
  }
  const [r = 0, g = 0, b = 0, a = 255] = color;
  return { r, g, b, alpha: a / 255 };
}

/**
 * Stacks the chosen trait images into one RGBA PNG. Layers are drawn in
 * combination order, each one "over" everything before it.
 */
export class ImageCompositor {
  private config: CanvasConfig;

  constructor(config: CanvasConfig) {
    this.config = config;
  }

  async compose(combination: TraitCombination): Promise<Buffer> {
    let base: sharp.Sharp;
    let overlays: TraitCombination;

    if (this.config.draw_background) {
      base = this.createCanvas(toSharpColor(this.config.background_color));
      overlays = combination;
    } else {
      const [first, ...rest] = combination;
      base = first && isTrait(first)
        ? sharp(first.path).ensureAlpha()
        : this.createCanvas(TRANSPARENT);
      overlays = rest;
    }

    const composites: sharp.OverlayOptions[] = overlays
      .filter(isTrait)
      .map((trait: Trait): sharp.OverlayOptions => ({ input: trait.path, blend: 'over' }));

    logger.debug('Compositing layers', {
      drawBackground: this.config.draw_background,
      overlays: composites.length
    });

    return base.composite(composites).png().toBuffer();
  }

  async render(combination: TraitCombination, outputPath: string): Promise<void> {
    const image = await this.compose(combination);
    await fs.ensureDir(path.dirname(outputPath));
    await fs.writeFile(outputPath, image);
  }

  private createCanvas(background: sharp.Color): sharp.Sharp {
    return sharp({
      create: {
        width: this.config.canvas_width,
        height: this.config.canvas_height,
        channels: 4,
        background
      }
    });
  }
}
