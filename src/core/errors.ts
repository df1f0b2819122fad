/**
 * Infrastructure failures that escape the core. Expected outcomes (rejected
 * events, duplicate deliveries, unknown chats) are modelled as values instead.
 */

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The store could not complete an operation; nothing from it was applied. */
export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Storage operation "${operation}" failed: ${describeError(cause)}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export type CompletionFailureKind = 'timeout' | 'status' | 'transport' | 'empty';

export class CompletionError extends Error {
  readonly kind: CompletionFailureKind;
  readonly status?: number;

  constructor(kind: CompletionFailureKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'CompletionError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export class QueueFullError extends Error {
  constructor(limit: number) {
    super(`Ingestion queue is full (${limit} pending events)`);
    this.name = 'QueueFullError';
  }
}
