import { createRgbBuffer, type RgbBuffer } from '../models/pixel-buffer.model';
import { RenderError, errorMessage } from '../utils/errors';
import { mmToDots } from '../utils/unit-converter';
import type { PageDimensions, PageRenderer } from './document.service';

export interface RasterizeOptions {
  readonly paperWidthMm: number;
  /** Render at this multiple of the target size, then area-average down */
  readonly supersample: number;
}

/** Target raster size: paper width in dots, height kept in proportion */
export function computeTargetSize(native: PageDimensions, paperWidthMm: number): PageDimensions {
  if (native.width <= 0 || native.height <= 0) {
    throw new RenderError(`Invalid page size ${native.width}x${native.height}`);
  }
  const width = mmToDots(paperWidthMm);
  if (width <= 0) {
    throw new RenderError(`Paper width ${paperWidthMm}mm is too small`);
  }
  const scale = width / native.width;
  return { width, height: Math.max(1, Math.round(native.height * scale)) };
}

interface AreaSpan {
  readonly start: number;
  readonly weights: readonly number[];
}

/** Source pixels covered by each destination pixel, weighted by coverage */
function areaSpans(srcSize: number, dstSize: number): AreaSpan[] {
  const scale = srcSize / dstSize;
  const spans: AreaSpan[] = [];
  for (let d = 0; d < dstSize; d++) {
    const lo = d * scale;
    const hi = lo + scale;
    const start = Math.floor(lo);
    const end = Math.min(srcSize, Math.ceil(hi));
    const weights: number[] = [];
    for (let s = start; s < end; s++) {
      weights.push((Math.min(hi, s + 1) - Math.max(lo, s)) / scale);
    }
    spans.push({ start, weights });
  }
  return spans;
}

/** Area-averaging resample to exactly width x height */
export function downsampleArea(src: RgbBuffer, width: number, height: number): RgbBuffer {
  if (src.width === width && src.height === height) {
    return src;
  }

  const xSpans = areaSpans(src.width, width);
  const ySpans = areaSpans(src.height, height);

  // Horizontal pass into a float row buffer, then vertical
  const rows = new Float64Array(width * src.height * 3);
  for (let y = 0; y < src.height; y++) {
    const srcRow = y * src.width * 3;
    const dstRow = y * width * 3;
    for (let x = 0; x < width; x++) {
      const { start, weights } = xSpans[x];
      let r = 0;
      let g = 0;
      let b = 0;
      for (let k = 0; k < weights.length; k++) {
        const p = srcRow + (start + k) * 3;
        r += src.data[p] * weights[k];
        g += src.data[p + 1] * weights[k];
        b += src.data[p + 2] * weights[k];
      }
      rows[dstRow + x * 3] = r;
      rows[dstRow + x * 3 + 1] = g;
      rows[dstRow + x * 3 + 2] = b;
    }
  }

  const out = createRgbBuffer(width, height);
  for (let y = 0; y < height; y++) {
    const { start, weights } = ySpans[y];
    for (let x = 0; x < width; x++) {
      for (let c = 0; c < 3; c++) {
        let sum = 0;
        for (let k = 0; k < weights.length; k++) {
          sum += rows[((start + k) * width + x) * 3 + c] * weights[k];
        }
        const v = Math.round(sum);
        out.data[(y * width + x) * 3 + c] = v < 0 ? 0 : v > 255 ? 255 : v;
      }
    }
  }
  return out;
}

/**
 * Render one page at the thermal head's resolution. Failures are fatal for the
 * job: there is no partial-page fallback.
 */
export async function rasterizePage(
  renderer: PageRenderer,
  index: number,
  options: RasterizeOptions,
): Promise<RgbBuffer> {
  const target = computeTargetSize(renderer.pageDimensions(index), options.paperWidthMm);
  const factor = Math.max(1, Math.floor(options.supersample));

  let highRes: RgbBuffer;
  try {
    highRes = await renderer.renderPage(index, target.width * factor, target.height * factor);
  } catch (error) {
    if (error instanceof RenderError) throw error;
    throw new RenderError(`Cannot render page ${index + 1}: ${errorMessage(error)}`, error);
  }

  return downsampleArea(highRes, target.width, target.height);
}
