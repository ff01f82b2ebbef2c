/**
 * Builds the URL printed on QR codes and written to NFC chips. The shape
 * `/play?h=<cardId>[&y=<fragment>]` is frozen once cards exist.
 */
export function buildPlayUrl(baseUrl: string, cardId: string, sourceFragment?: string | null): string {
  const base = baseUrl.replace(/\/+$/, '');
  const url = `${base}/play?h=${encodeURIComponent(cardId)}`;
  if (sourceFragment === undefined || sourceFragment === null) {
    return url;
  }
  return `${url}&y=${encodeURIComponent(sourceFragment)}`;
}
