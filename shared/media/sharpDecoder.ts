import sharp from "sharp";

import { ImageDecodeError, type Dimensions, type PhotoCanvas, type PhotoDecoder } from "./compress";

const JPEG_MIME = "image/jpeg";

// EXIF orientations 5-8 are rotated a quarter turn
function isQuarterTurn(orientation: number | undefined): boolean {
  return typeof orientation === "number" && orientation >= 5;
}

function toJpegQuality(quality: number): number {
  return Math.min(100, Math.max(1, Math.round(quality * 100)));
}

export function createSharpDecoder(): PhotoDecoder {
  return {
    async measure(input: Uint8Array): Promise<Dimensions> {
      let metadata: sharp.Metadata;
      try {
        metadata = await sharp(input).metadata();
      } catch (error) {
        throw new ImageDecodeError("Photo could not be decoded", { cause: error });
      }
      const { width, height, orientation } = metadata;
      if (!width || !height) {
        throw new ImageDecodeError("Photo has no dimensions");
      }
      return isQuarterTurn(orientation) ? { width: height, height: width } : { width, height };
    },

    async draw(input: Uint8Array, size: Dimensions): Promise<PhotoCanvas> {
      let raw: { data: Buffer; info: sharp.OutputInfo };
      try {
        raw = await sharp(input)
          .rotate()
          .resize(size.width, size.height, { fit: "fill" })
          .removeAlpha()
          .raw()
          .toBuffer({ resolveWithObject: true });
      } catch (error) {
        throw new ImageDecodeError("Photo could not be drawn", { cause: error });
      }
      const { data, info } = raw;
      return {
        width: info.width,
        height: info.height,
        mimeType: JPEG_MIME,
        async encode(quality: number): Promise<Uint8Array> {
          const encoded = await sharp(data, {
            raw: { width: info.width, height: info.height, channels: info.channels },
          })
            .jpeg({ quality: toJpegQuality(quality) })
            .toBuffer();
          return new Uint8Array(encoded);
        },
      };
    },
  };
}
