import sharp from "sharp";

import { ImageDecodeError } from "./errors";

export interface DecodedImage {
  data: Buffer;
  mimeType: string;
  width: number;
  height: number;
}

// Formats the model accepts without conversion.
const PASSTHROUGH_MIME_TYPES: Record<string, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
};

export async function decodeImage(bytes: Buffer): Promise<DecodedImage> {
  if (bytes.length === 0) {
    throw new ImageDecodeError("Uploaded image is empty.");
  }

  try {
    const image = sharp(bytes);
    const { format, width, height } = await image.metadata();

    if (!format || width === undefined || height === undefined) {
      throw new Error("Image header is missing format or dimensions.");
    }

    const mimeType = PASSTHROUGH_MIME_TYPES[format];
    if (mimeType) {
      return { data: bytes, mimeType, width, height };
    }

    console.log(`Converting ${format} upload to png`);
    return {
      data: await image.png().toBuffer(),
      mimeType: "image/png",
      width,
      height,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ImageDecodeError(`Could not decode uploaded image: ${message}`, {
      cause: error,
    });
  }
}
