/**
 * Loads and decodes image files named by deck image elements.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { loadImage, type Image } from '@napi-rs/canvas';
import type { ILogger } from './Logger.js';
import { createLogger } from './Logger.js';

/**
 * Image formats recognized by signature.
 */
export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'webp' | 'unknown';

/**
 * Result of decoding an image.
 */
export interface DecodedImage {
  /** Source path as named in the deck */
  name: string;
  /** Encoded file bytes */
  data: Buffer;
  /** The decoded image */
  image: Image;
  /** Image width in pixels */
  width: number;
  /** Image height in pixels */
  height: number;
  /** Detected format */
  format: ImageFormat;
}

/**
 * Configuration for ImageDecoder.
 */
export interface ImageDecoderConfig {
  /** Directory relative image names resolve against */
  baseDir?: string;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Image signature bytes for format detection.
 */
const IMAGE_SIGNATURES = {
  png: [0x89, 0x50, 0x4e, 0x47], // .PNG
  jpeg: [0xff, 0xd8, 0xff], // JPEG SOI marker
  gif: [0x47, 0x49, 0x46], // GIF
  bmp: [0x42, 0x4d], // BM
  webp: [0x52, 0x49, 0x46, 0x46], // RIFF (WebP container)
} as const;

/**
 * Decodes images, caching each file for the life of the decoder.
 */
export class ImageDecoder {
  private readonly logger: ILogger;
  private readonly baseDir: string;
  private readonly cache: Map<string, Promise<DecodedImage>> = new Map();

  constructor(config: ImageDecoderConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'ImageDecoder');
    this.baseDir = config.baseDir ?? process.cwd();
  }

  /**
   * Detects the image format from the buffer's magic bytes.
   */
  detectFormat(buffer: Buffer): ImageFormat {
    if (buffer.length < 4) {
      return 'unknown';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.png)) {
      return 'png';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.jpeg)) {
      return 'jpeg';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.gif)) {
      return 'gif';
    }
    if (this.matchesSignature(buffer, IMAGE_SIGNATURES.bmp)) {
      return 'bmp';
    }
    if (
      this.matchesSignature(buffer, IMAGE_SIGNATURES.webp) &&
      buffer.length >= 12 &&
      buffer.toString('ascii', 8, 12) === 'WEBP'
    ) {
      return 'webp';
    }
    return 'unknown';
  }

  /**
   * Loads and decodes an image file.
   *
   * @throws Error if the file cannot be read or decoded
   */
  load(name: string): Promise<DecodedImage> {
    const filePath = path.resolve(this.baseDir, name);
    let pending = this.cache.get(filePath);
    if (!pending) {
      pending = this.readAndDecode(name, filePath);
      this.cache.set(filePath, pending);
    }
    return pending;
  }

  /**
   * Decodes an image from a Buffer.
   */
  async decode(name: string, data: Buffer): Promise<DecodedImage> {
    const format = this.detectFormat(data);

    try {
      const image = await loadImage(data);
      this.logger.debug('Image decoded', { name, format, width: image.width, height: image.height });
      return { name, data, image, width: image.width, height: image.height, format };
    } catch (error) {
      throw new Error(`Failed to decode image ${name}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async readAndDecode(name: string, filePath: string): Promise<DecodedImage> {
    try {
      const data = await readFile(filePath);
      return await this.decode(name, data);
    } catch (error) {
      this.cache.delete(filePath);
      throw error;
    }
  }

  private matchesSignature(buffer: Buffer, signature: readonly number[]): boolean {
    if (buffer.length < signature.length) {
      return false;
    }
    return signature.every((byte, i) => buffer[i] === byte);
  }
}

/**
 * Creates an ImageDecoder instance.
 */
export function createImageDecoder(baseDir?: string, logger?: ILogger): ImageDecoder {
  return new ImageDecoder({ baseDir, logger });
}
