export type TapdeckErrorKind =
  | 'unknown-card'
  | 'source-unavailable'
  | 'unsupported-source'
  | 'storage-error'
  | 'content-missing'
  | 'deck-unavailable'
  | 'internal-error';

/**
 * Base class for every failure the resolution and playback pipeline reports.
 * `kind` is stable and is what the HTTP gateway maps to a response.
 */
export class TapdeckError extends Error {
  constructor(
    public readonly kind: TapdeckErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No binding and no fallback reference: terminal for the request. */
export class UnknownCardError extends TapdeckError {
  constructor(public readonly cardId: string) {
    super('unknown-card', `card ${cardId} has no local audio and no fallback reference`);
  }
}

/** The fallback source could not be retrieved (network, removed, restricted). */
export class SourceUnavailableError extends TapdeckError {
  constructor(
    public readonly sourceKey: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super('source-unavailable', `source ${sourceKey} unavailable: ${detail}`, options);
  }
}

/** The fallback reference does not describe a retrievable source. */
export class UnsupportedSourceError extends TapdeckError {
  constructor(
    public readonly sourceHint: string,
    detail = 'not a recognised source reference',
  ) {
    super('unsupported-source', `unsupported source "${sourceHint}": ${detail}`);
  }
}

/** Local I/O failure while reading or writing stored audio or the registry. */
export class StorageError extends TapdeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage-error', message, options);
  }
}

/** A content reference that is not a published entry of the content store. */
export class ContentNotFoundError extends TapdeckError {
  constructor(public readonly contentRef: string) {
    super('content-missing', `content ${contentRef} not found`);
  }
}

/** The deck refused or failed to open an output stream. */
export class PlaybackError extends TapdeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('deck-unavailable', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toTapdeckError(error: unknown): TapdeckError {
  if (error instanceof TapdeckError) {
    return error;
  }
  return new TapdeckError('internal-error', errorMessage(error), { cause: error });
}
