import fs from 'fs/promises';
import { IOError } from '../errors/app-error';

export function extractBase64Payload(input: string): string {
  const trimmed = input.trim();
  const dataUrlMatch = /^data:[^;,]+;base64,(?<payload>.+)$/is.exec(trimmed);
  if (dataUrlMatch?.groups?.payload) {
    return dataUrlMatch.groups.payload;
  }
  return trimmed;
}

export function encodeImageBuffer(buffer: Uint8Array): string {
  return Buffer.from(buffer).toString('base64');
}

/**
 * Reads an image file and returns it as the standard base64 string expected by
 * the `image`, `imageA`, `imageB` and `images` request fields.
 */
export async function encodeImage(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new IOError(`Failed to read image file ${filePath}`, filePath, error);
  }
  return encodeImageBuffer(buffer);
}
