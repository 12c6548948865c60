import {
  DEFAULT_PHOTO_MAX_BYTES,
  DEFAULT_PHOTO_MAX_DIMENSION,
  DEFAULT_PHOTO_QUALITY,
  DEFAULT_PHOTO_QUALITY_FLOOR,
  DEFAULT_PHOTO_QUALITY_STEP,
} from "../config";
import { emitReliabilityEvent } from "../reliability/events";

export type Dimensions = { width: number; height: number };

/** A decoded image already drawn at its target size, ready to be encoded. */
export interface PhotoCanvas extends Dimensions {
  readonly mimeType: string;
  encode(quality: number): Promise<Uint8Array>;
}

export interface PhotoDecoder {
  measure(input: Uint8Array): Promise<Dimensions>;
  draw(input: Uint8Array, size: Dimensions): Promise<PhotoCanvas>;
}

export type PhotoInput = Uint8Array | string;

export type CompressOptions = {
  maxDimension: number;
  initialQuality: number;
  qualityStep: number;
  qualityFloor: number;
  maxBytes: number;
};

export type CompressedPhoto = Dimensions & {
  dataUrl: string;
  mimeType: string;
  quality: number;
  bytes: number;
  withinBudget: boolean;
  attempts: number[];
};

export class ImageDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageDecodeError";
  }
}

export const DEFAULT_COMPRESS_OPTIONS: CompressOptions = {
  maxDimension: DEFAULT_PHOTO_MAX_DIMENSION,
  initialQuality: DEFAULT_PHOTO_QUALITY,
  qualityStep: DEFAULT_PHOTO_QUALITY_STEP,
  qualityFloor: DEFAULT_PHOTO_QUALITY_FLOOR,
  maxBytes: DEFAULT_PHOTO_MAX_BYTES,
};

const DATA_URL_PATTERN = /^data:([^;,]*)(;base64)?,(.*)$/s;

function roundQuality(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Scales down uniformly so that neither side exceeds `maxDimension`. */
export function fitWithin(size: Dimensions, maxDimension: number): Dimensions {
  const { width, height } = size;
  if (width <= maxDimension && height <= maxDimension) {
    return { width, height };
  }
  const scale = Math.min(maxDimension / width, maxDimension / height);
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

/**
 * Qualities to try, highest first: the start value, then fixed decrements,
 * ending exactly on the floor.
 */
export function qualityLadder(start: number, step: number, floor: number): number[] {
  const bottom = roundQuality(floor);
  const top = roundQuality(Math.max(start, floor));
  const ladder = [top];
  if (step <= 0) {
    return ladder;
  }
  let current = top;
  while (current > bottom) {
    const next = roundQuality(current - step);
    // steps finer than the rounding go straight to the floor
    current = next < bottom || next >= current ? bottom : next;
    ladder.push(current);
  }
  return ladder;
}

/** Decoded size of the data URL payload, the way the upload transport counts it. */
export function estimatePayloadBytes(dataUrl: string): number {
  return Math.floor(dataUrl.length * 0.75);
}

export function toDataUrl(bytes: Uint8Array, mimeType: string): string {
  return `data:${mimeType};base64,${Buffer.from(bytes).toString("base64")}`;
}

export function decodePhotoInput(input: PhotoInput): Uint8Array {
  if (typeof input !== "string") {
    return input;
  }
  const match = input.match(DATA_URL_PATTERN);
  if (!match) {
    throw new ImageDecodeError("Photo input is not a data URL");
  }
  const [, , base64Flag, payload] = match;
  if (base64Flag) {
    return new Uint8Array(Buffer.from(payload, "base64"));
  }
  try {
    return new Uint8Array(Buffer.from(decodeURIComponent(payload), "utf8"));
  } catch (error) {
    throw new ImageDecodeError("Photo data URL is not properly encoded", { cause: error });
  }
}

export async function compressPhoto(
  input: PhotoInput,
  decoder: PhotoDecoder,
  options: Partial<CompressOptions> = {},
): Promise<CompressedPhoto> {
  const cfg: CompressOptions = { ...DEFAULT_COMPRESS_OPTIONS, ...options };
  const bytes = decodePhotoInput(input);

  const original = await decoder.measure(bytes);
  if (!(original.width > 0) || !(original.height > 0)) {
    throw new ImageDecodeError("Photo has no pixels");
  }
  const target = fitWithin(original, cfg.maxDimension);
  const canvas = await decoder.draw(bytes, target);

  const attempts: number[] = [];
  let best: { dataUrl: string; quality: number; bytes: number } | null = null;
  for (const quality of qualityLadder(cfg.initialQuality, cfg.qualityStep, cfg.qualityFloor)) {
    const dataUrl = toDataUrl(await canvas.encode(quality), canvas.mimeType);
    const size = estimatePayloadBytes(dataUrl);
    attempts.push(quality);
    if (!best || size < best.bytes) {
      best = { dataUrl, quality, bytes: size };
    }
    if (size <= cfg.maxBytes) {
      break;
    }
  }
  if (!best) {
    throw new ImageDecodeError("Photo could not be encoded");
  }

  const result: CompressedPhoto = {
    ...best,
    mimeType: canvas.mimeType,
    width: canvas.width,
    height: canvas.height,
    withinBudget: best.bytes <= cfg.maxBytes,
    attempts,
  };
  emitReliabilityEvent({
    type: "photo:compressed",
    timestamp: Date.now(),
    width: result.width,
    height: result.height,
    quality: result.quality,
    bytes: result.bytes,
    withinBudget: result.withinBudget,
  });
  return result;
}
