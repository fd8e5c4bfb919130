/**
 * Shared bookkeeping for a single pack or unpack run: phase transitions,
 * progress reporting, cancellation and error wrapping.
 */
import type { ArchiveOperationOptions, OperationPhase, PboLogger } from '../types/operation.js';
import { CancelledError, PboError, PboIoError } from '../types/errors.js';

/**
 * Integer percentage of `index` items out of `total`, i.e. `floor(index / total * 100)`.
 * Always below 100 for `index < total`.
 */
export function progressPercent(index: number, total: number): number {
  if (total <= 0) return 0;
  return Math.floor((index / total) * 100);
}

export class ArchiveOperation {
  readonly logger: PboLogger;

  constructor(
    private readonly operation: 'Pack' | 'Extract',
    private readonly options: ArchiveOperationOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  enter(phase: OperationPhase): void {
    this.options.onPhaseChange?.(phase);
  }

  /** @throws {CancelledError} If the caller's signal has been aborted */
  throwIfCancelled(): void {
    if (this.options.signal?.aborted) {
      throw new CancelledError(this.operation);
    }
  }

  /**
   * Sends `<verb>: <name> (<percent>%)` to the reporter. A reporter that throws
   * is logged and otherwise ignored.
   */
  report(verb: string, entryName: string, index: number, total: number): void {
    const onProgress = this.options.onProgress;
    if (!onProgress) return;

    const percent = progressPercent(index, total);
    try {
      onProgress(`${verb}: ${entryName} (${percent}%)`, percent);
    } catch (error) {
      this.logger.warn(`⚠️  Progress reporter failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Runs `work`, moving to `done` on success and `failed` on any error.
   * Errors that are not already a `PboError` are wrapped as `IOError`.
   */
  async run<T>(work: () => Promise<T>): Promise<T> {
    try {
      const result = await work();
      this.enter('done');
      return result;
    } catch (error) {
      this.enter('failed');
      if (error instanceof PboError) {
        throw error;
      }
      throw new PboIoError(
        `${this.operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }
}
