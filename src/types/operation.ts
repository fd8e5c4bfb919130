/**
 * Options shared by pack and unpack operations.
 */
import type { PboHeaderProperties } from './pbo-archive-structure.js';

/** Minimal logging surface; `console` satisfies it. */
export interface PboLogger {
  log: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Receives a status line and the integer percentage of items completed before
 * the current one. Advisory only: its return value is ignored.
 */
export type ProgressReporter = (message: string, percent: number) => void;

export type OperationPhase = 'idle' | 'scanning' | 'writing' | 'finalizing' | 'done' | 'failed';

export interface ArchiveOperationOptions {
  readonly onProgress?: ProgressReporter;
  readonly onPhaseChange?: (phase: OperationPhase) => void;
  /** Checked before each file; an aborted signal fails the operation with `Cancelled`. */
  readonly signal?: AbortSignal;
  /** Defaults to `console`. */
  readonly logger?: PboLogger;
}

export interface CreateArchiveOptions extends ArchiveOperationOptions {
  /** Header properties written after the `sreV` marker. */
  readonly properties?: PboHeaderProperties;
}

export type ExtractArchiveOptions = ArchiveOperationOptions;
