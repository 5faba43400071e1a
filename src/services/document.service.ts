import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import sharp from 'sharp';
import { v4 as uuidv4 } from 'uuid';
import { createRgbBuffer, type RgbBuffer } from '../models/pixel-buffer.model';
import { DocumentError, RenderError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/** A submitted document; the stream it hands out may not be seekable */
export interface DocumentSource {
  readonly name: string;
  openStream(): Readable;
}

export interface PageDimensions {
  readonly width: number;
  readonly height: number;
}

/** Random page access over a locally owned, seekable copy */
export interface PageRenderer {
  pageCount(): number;
  pageDimensions(index: number): PageDimensions;
  /** Renders onto opaque white at exactly width x height */
  renderPage(index: number, width: number, height: number): Promise<RgbBuffer>;
  close(): Promise<void>;
}

export interface RendererFactory {
  open(filePath: string): Promise<PageRenderer>;
}

export interface SeekableDocument {
  readonly path: string;
  readonly size: number;
  release(): Promise<void>;
}

export function bufferDocumentSource(name: string, data: Buffer): DocumentSource {
  return {
    name,
    openStream: () => Readable.from([data]),
  };
}

export function fileDocumentSource(filePath: string): DocumentSource {
  return {
    name: path.basename(filePath),
    openStream: () => fs.createReadStream(filePath),
  };
}

/**
 * Copy the incoming document into a temp file owned by the job. Page rendering
 * needs random access, which the submitted stream does not guarantee.
 */
export async function createSeekableCopy(source: DocumentSource, dir: string): Promise<SeekableDocument> {
  await fsp.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `job-${uuidv4()}.doc`);

  try {
    await pipeline(source.openStream(), fs.createWriteStream(filePath));
  } catch (error) {
    await fsp.rm(filePath, { force: true });
    throw new DocumentError(`Cannot read document "${source.name}": ${errorMessage(error)}`, error);
  }

  const { size } = await fsp.stat(filePath);
  if (size === 0) {
    await fsp.rm(filePath, { force: true });
    throw new DocumentError(`Document "${source.name}" is empty`);
  }

  logger.debug({ document: source.name, filePath, size }, 'Seekable document copy created');

  return {
    path: filePath,
    size,
    release: async () => {
      await fsp.rm(filePath, { force: true });
    },
  };
}

/**
 * Raster documents decoded by sharp: PNG, JPEG, WebP, GIF and TIFF (one page
 * per frame/IFD) and SVG.
 */
class SharpPageRenderer implements PageRenderer {
  private closed = false;

  constructor(
    private readonly filePath: string,
    private readonly pages: readonly PageDimensions[],
  ) {}

  pageCount(): number {
    return this.pages.length;
  }

  pageDimensions(index: number): PageDimensions {
    const dims = this.pages[index];
    if (!dims) {
      throw new RenderError(`Page ${index + 1} is out of range (document has ${this.pages.length})`);
    }
    return dims;
  }

  async renderPage(index: number, width: number, height: number): Promise<RgbBuffer> {
    if (this.closed) {
      throw new RenderError('Renderer is closed');
    }
    const { data, info } = await sharp(this.filePath, { page: index })
      .flatten({ background: '#ffffff' })
      .resize(width, height, { fit: 'fill' })
      .toColourspace('srgb')
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new RenderError(`Page ${index + 1} decoded with ${info.channels} channels, expected 3`);
    }
    return createRgbBuffer(info.width, info.height, new Uint8Array(data.buffer, data.byteOffset, data.length));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const sharpRendererFactory: RendererFactory = {
  async open(filePath: string): Promise<PageRenderer> {
    try {
      const meta = await sharp(filePath).metadata();
      const pageTotal = meta.pages ?? 1;
      const pages: PageDimensions[] = [];

      for (let i = 0; i < pageTotal; i++) {
        const pageMeta = i === 0 ? meta : await sharp(filePath, { page: i }).metadata();
        const width = pageMeta.width ?? 0;
        const height = pageMeta.pageHeight ?? pageMeta.height ?? 0;
        if (width <= 0 || height <= 0) {
          throw new Error(`page ${i + 1} has no dimensions`);
        }
        pages.push({ width, height });
      }

      return new SharpPageRenderer(filePath, pages);
    } catch (error) {
      throw new DocumentError(`Unsupported or corrupt document: ${errorMessage(error)}`, error);
    }
  },
};
