import { emitReliabilityEvent } from "../reliability/events";
import { createLogger } from "../telemetry/logger";
import { ImageDecodeError, type CompressedPhoto, type PhotoInput } from "./compress";

export type PhotoCompressor = (input: PhotoInput) => Promise<CompressedPhoto>;

export type AttachmentsState = {
  photos: CompressedPhoto[];
  pending: number;
  busy: boolean;
  rejected: number;
};

export type AttachmentBatchResult = {
  added: number;
  rejected: number;
};

const logger = createLogger("media/attachments");

/**
 * Photos attached to the scan being edited. Compressions run concurrently;
 * the submission stays blocked while any of them is outstanding.
 */
export class PhotoAttachments {
  private photos: CompressedPhoto[] = [];
  private pending = 0;
  private rejected = 0;
  private generation = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly listeners = new Set<() => void>();

  constructor(private readonly compress: PhotoCompressor) {}

  async add(inputs: PhotoInput[]): Promise<AttachmentBatchResult> {
    const generation = this.generation;
    this.pending += inputs.length;
    this.notify();
    const outcomes = await Promise.all(inputs.map((input) => this.compressOne(input, generation)));
    return {
      added: outcomes.filter((outcome) => outcome === "added").length,
      rejected: outcomes.filter((outcome) => outcome === "rejected").length,
    };
  }

  getSnapshot(): AttachmentsState {
    return {
      photos: this.photos.slice(),
      pending: this.pending,
      busy: this.pending > 0,
      rejected: this.rejected,
    };
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  whenIdle(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  dataUrls(): string[] {
    return this.photos.map((photo) => photo.dataUrl);
  }

  /** Drops every photo; compressions still running will be discarded. */
  clear(): void {
    this.generation += 1;
    this.photos = [];
    this.rejected = 0;
    this.notify();
  }

  private async compressOne(
    input: PhotoInput,
    generation: number,
  ): Promise<"added" | "rejected" | "discarded"> {
    let outcome: "added" | "rejected" | "discarded";
    try {
      const photo = await this.compress(input);
      if (generation === this.generation) {
        this.photos.push(photo);
        outcome = "added";
      } else {
        outcome = "discarded";
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (!(error instanceof ImageDecodeError)) {
        logger.error("photo compression failed", { reason });
      } else {
        logger.warn("photo dropped", { reason });
      }
      emitReliabilityEvent({ type: "photo:rejected", timestamp: Date.now(), reason });
      if (generation === this.generation) {
        this.rejected += 1;
      }
      outcome = "rejected";
    }
    this.pending -= 1;
    this.notify();
    if (this.pending === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
    return outcome;
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (error) {
        logger.warn("attachments listener failed", {
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
