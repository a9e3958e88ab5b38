import { InvalidBatchSizeError } from '../core/errors';

export function assertBatchSize(maxBatchSize: number): void {
  if (!Number.isInteger(maxBatchSize) || maxBatchSize <= 0) {
    throw new InvalidBatchSizeError(maxBatchSize);
  }
}

/**
 * Split a list into contiguous batches of at most `maxBatchSize` items, preserving order.
 * The last batch may be shorter; an empty list yields no batches.
 */
export function partition<T>(items: readonly T[], maxBatchSize: number): T[][] {
  assertBatchSize(maxBatchSize);

  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += maxBatchSize) {
    batches.push(items.slice(start, start + maxBatchSize));
  }
  return batches;
}
