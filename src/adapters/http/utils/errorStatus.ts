import type { TapdeckErrorKind } from '@/domain/errors';

/** Response header carrying the stable error kind of a failed request. */
export const ERROR_HEADER = 'X-Tapdeck-Error';

export const MISSING_CARD_ID = 'missing-card-id';

const STATUS_BY_KIND: Record<TapdeckErrorKind, number> = {
  'unknown-card': 404,
  'unsupported-source': 422,
  'source-unavailable': 502,
  'content-missing': 500,
  'deck-unavailable': 503,
  'storage-error': 507,
  'internal-error': 500,
};

export function statusForError(kind: TapdeckErrorKind): number {
  return STATUS_BY_KIND[kind];
}
