import { UnsupportedSourceError } from '@/domain/errors';

/**
 * Canonical identity of an external audio source. Two hints that normalize to
 * the same `key` share one download and one stored payload.
 */
export interface SourceRef {
  key: string;
  videoId: string;
  url: string;
}

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const YOUTUBE_HOSTS = new Set(['youtube.com', 'youtube-nocookie.com']);
const ID_PATH_PREFIXES = new Set(['shorts', 'embed', 'live', 'v']);

/**
 * Turns the raw `y` fragment of a card URL into a canonical YouTube source.
 *
 * Cards carry "part of the YouTube link", so besides full URLs this accepts a
 * bare video id, `watch?v=<id>` / `v=<id>` fragments and scheme-less
 * `youtu.be/<id>` style links. Query noise (`t=`, `si=`, `list=`) is dropped.
 */
export function normalizeSourceRef(hint: string): SourceRef {
  const raw = hint.trim();
  if (!raw) {
    throw new UnsupportedSourceError(hint, 'empty reference');
  }
  const videoId = extractVideoId(raw);
  if (!videoId) {
    throw new UnsupportedSourceError(hint);
  }
  return {
    key: `youtube:${videoId}`,
    videoId,
    url: `https://www.youtube.com/watch?v=${videoId}`,
  };
}

function extractVideoId(raw: string): string | null {
  const head = raw.split(/[?&#]/)[0] ?? '';
  if (VIDEO_ID_PATTERN.test(head)) {
    return head;
  }

  const fragment = /^\/?(?:watch)?\??(v=.*)$/.exec(raw);
  if (fragment) {
    return validId(new URLSearchParams(fragment[1]).get('v'));
  }

  const url = parseLooseUrl(raw);
  if (!url) {
    return null;
  }
  const host = url.hostname.toLowerCase().replace(/^(www|m|music)\./, '');
  const segments = url.pathname.split('/').filter(Boolean);

  if (host === 'youtu.be') {
    return validId(segments[0]);
  }
  if (!YOUTUBE_HOSTS.has(host)) {
    return null;
  }
  if (segments[0] === 'watch') {
    return validId(url.searchParams.get('v'));
  }
  if (segments[0] && ID_PATH_PREFIXES.has(segments[0])) {
    return validId(segments[1]);
  }
  return null;
}

function parseLooseUrl(raw: string): URL | null {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `https://${raw.replace(/^\/+/, '')}`;
  try {
    return new URL(candidate);
  } catch {
    return null;
  }
}

function validId(value: string | null | undefined): string | null {
  return value && VIDEO_ID_PATTERN.test(value) ? value : null;
}

/**
 * The shortest `y` fragment that normalizes back to `sourceKey`, or null for
 * keys this module did not produce.
 */
export function sourceFragmentForKey(sourceKey: string): string | null {
  const match = /^youtube:([A-Za-z0-9_-]{11})$/.exec(sourceKey);
  return match?.[1] ?? null;
}
