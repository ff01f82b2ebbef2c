const AUDIO_MIME_TYPES: Record<string, string> = {
  mpeg: 'audio/mpeg',
  mp3: 'audio/mpeg',
  m4a: 'audio/x-m4a',
  aac: 'audio/aac',
  wav: 'audio/wav',
  ogg: 'audio/ogg',
  opus: 'audio/ogg',
  flac: 'audio/flac',
  webm: 'audio/webm',
  matroska: 'audio/x-matroska',
};

/**
 * MIME type for a stored entry's format tag.
 */
export function getAudioMimeType(format: string): string {
  return AUDIO_MIME_TYPES[format.toLowerCase()] ?? 'application/octet-stream';
}
