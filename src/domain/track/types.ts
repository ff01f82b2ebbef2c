/**
 * Address of a stored audio payload: the lowercase sha256 hex of its bytes.
 */
export type ContentRef = string;

/**
 * One card → audio binding as persisted by the track registry.
 */
export interface TrackRecord {
  cardId: string;
  /** Null when a binding exists without playable audio. */
  contentRef: ContentRef | null;
  /** Canonical fallback source key last used to fill the record (e.g. `youtube:<id>`). */
  sourceRef: string | null;
  createdAt: number;
  lastPlayedAt: number | null;
}

/**
 * A published audio payload in the content store.
 */
export interface ContentEntry {
  contentHash: ContentRef;
  byteSize: number;
  /** Container tag detected from the bytes (`mpeg`, `webm`, `m4a`, ...), or `unknown`. */
  format: string;
  /** Number of track records pointing at the entry; informational only. */
  refCount: number;
}
