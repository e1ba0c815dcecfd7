// Chunk bookkeeping for ranged uploads/downloads and the bounded worker pool
// that drives them.

import { TransferError } from '../errors.js';

/** Byte range of one chunk. `end` is exclusive. */
export interface ChunkRange {
  index: number;
  start: number;
  end: number;
}

/**
 * Tracks which chunks of a payload have been handed out and acknowledged.
 *
 * Chunks are dispatched in offset order, so `nextOffset` only grows. The
 * transfer is complete once every chunk has been acknowledged and none failed.
 */
export class ChunkTransfer {
  readonly totalSize: number;
  readonly chunkSize: number;
  readonly chunkCount: number;

  private nextIndex = 0;
  private inFlightCount = 0;
  private failed = false;
  private readonly acknowledged = new Set<number>();

  constructor(totalSize: number, chunkSize: number) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunk size must be a positive integer, got ${chunkSize}`);
    }
    this.totalSize = totalSize;
    this.chunkSize = chunkSize;
    this.chunkCount = Math.ceil(totalSize / chunkSize);
  }

  /** Offset of the first byte not yet handed out. */
  get nextOffset(): number {
    return Math.min(this.nextIndex * this.chunkSize, this.totalSize);
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get acknowledgedCount(): number {
    return this.acknowledged.size;
  }

  get isFailed(): boolean {
    return this.failed;
  }

  get isComplete(): boolean {
    return !this.failed && this.acknowledged.size === this.chunkCount;
  }

  /**
   * Hand out the next chunk, or undefined when all are dispatched or a chunk
   * has failed.
   */
  next(): ChunkRange | undefined {
    if (this.failed || this.nextIndex >= this.chunkCount) return undefined;

    const index = this.nextIndex++;
    const start = index * this.chunkSize;
    this.inFlightCount++;
    return { index, start, end: Math.min(start + this.chunkSize, this.totalSize) };
  }

  acknowledge(index: number): void {
    this.settle(index);
    this.acknowledged.add(index);
  }

  fail(index: number): void {
    this.settle(index);
    this.failed = true;
  }

  private settle(index: number): void {
    if (index < 0 || index >= this.nextIndex || this.acknowledged.has(index)) {
      throw new RangeError(`chunk ${index} is not in flight`);
    }
    this.inFlightCount--;
  }
}

/**
 * Run `worker` over every chunk of a transfer with at most `concurrency`
 * chunks in flight.
 *
 * After the first failure no new chunks start; chunks already in flight are
 * allowed to settle and the first error is rethrown.
 */
export async function runChunkedTransfer(
  transfer: ChunkTransfer,
  concurrency: number,
  worker: (chunk: ChunkRange) => Promise<void>
): Promise<void> {
  let firstError: unknown;
  let hasError = false;

  const lane = async (): Promise<void> => {
    for (let chunk = transfer.next(); chunk !== undefined; chunk = transfer.next()) {
      try {
        await worker(chunk);
        transfer.acknowledge(chunk.index);
      } catch (error) {
        transfer.fail(chunk.index);
        if (!hasError) {
          hasError = true;
          firstError = error;
        }
        return;
      }
    }
  };

  const laneCount = Math.min(Math.max(1, Math.floor(concurrency)), Math.max(1, transfer.chunkCount));
  await Promise.all(Array.from({ length: laneCount }, lane));

  if (hasError) throw firstError;
  if (!transfer.isComplete) {
    throw new TransferError(
      `${transfer.acknowledgedCount} of ${transfer.chunkCount} chunks acknowledged`
    );
  }
}
