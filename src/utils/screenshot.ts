import fs from 'fs';
import path from 'path';
import { OutputParseError, OutputWriteError } from '../types';

const PNG_SIGNATURE = '89504e470d0a1a0a';

export function isPng(data: Buffer): boolean {
  return data.length >= 24 && data.toString('hex', 0, 8) === PNG_SIGNATURE;
}

// Get image dimensions from PNG data
export function getPNGDimensions(pngData: Buffer): { width: number; height: number } {
  if (!isPng(pngData)) {
    throw new Error('Invalid PNG data');
  }

  // IHDR is always the first chunk: width at byte 16, height at byte 20 (big-endian)
  const width = pngData.readUInt32BE(16);
  const height = pngData.readUInt32BE(20);

  return { width, height };
}

// Rejects captures that do not start with the PNG signature
export function assertPng(data: Buffer, source: string): Buffer {
  if (!isPng(data)) {
    const preview = data.subarray(0, 64).toString('utf-8');
    throw new OutputParseError(`${source} screenshot`, preview || '(empty)');
  }
  return data;
}

// Convert binary data to base64
export function binaryToBase64(data: Buffer): string {
  return data.toString('base64');
}

/**
 * Write PNG bytes to `outputPath` unchanged, creating missing parent directories.
 * Returns the absolute path written.
 */
export function writeScreenshot(outputPath: string, data: Buffer): string {
  const target = path.resolve(outputPath);
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, data);
  } catch (error) {
    throw new OutputWriteError(target, error instanceof Error ? error.message : String(error));
  }
  return target;
}
