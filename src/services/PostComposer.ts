import { format } from 'date-fns';
import type { ComposedPost, PhotoMetadata } from '../types/Photo';

export interface ComposeOptions {
  /** Maximum post length in graphemes (Bluesky allows 300) */
  maxLength?: number;
  /** Caption used instead of the photo's embedded description */
  caption?: string;
  /** Photo attached to the post */
  mediaPath?: string;
}

export const DEFAULT_MAX_POST_LENGTH = 300;
const DATE_FORMAT = 'yyyy-MMM-dd';
const ELLIPSIS = '…';
const SEPARATOR = '\n\n';

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), s => s.segment);
}

function truncate(text: string, max: number): string {
  const parts = graphemes(text);
  if (parts.length <= max) return text;
  if (max <= 0) return '';
  return parts.slice(0, max - 1).join('').trimEnd() + ELLIPSIS;
}

/**
 * Builds the post for a photo: "<place> (<date>)" followed by the caption.
 * The header carries the structured fields and is kept whole; the caption is cut first.
 * Pure: the same inputs always give the same post.
 */
export function composePost(
  metadata: PhotoMetadata,
  place: string | null,
  options: ComposeOptions = {}
): ComposedPost {
  const maxLength = options.maxLength ?? DEFAULT_MAX_POST_LENGTH;
  const date = metadata.captureTime ? format(metadata.captureTime, DATE_FORMAT) : null;

  let header: string;
  if (place && date) header = `${place} (${date})`;
  else header = place ?? date ?? '';
  header = truncate(header, maxLength);

  const caption = (options.caption ?? metadata.description ?? '').trim();

  let text = header;
  if (caption) {
    const room = header
      ? maxLength - graphemes(header).length - SEPARATOR.length
      : maxLength;
    // Not worth a lone ellipsis
    if (room >= 2) {
      const body = truncate(caption, room);
      text = header ? `${header}${SEPARATOR}${body}` : body;
    }
  }

  const post: ComposedPost = { text };

  if (options.mediaPath) {
    post.media = {
      path: options.mediaPath,
      alt: metadata.description ?? (header || 'Photograph'),
    };
  }

  if (place && metadata.coordinates) {
    post.location = {
      name: place,
      coordinates: { ...metadata.coordinates },
    };
  }

  return post;
}

/**
 * Class wrapper so the composer can be injected like the other pipeline stages
 */
export class PostComposer {
  constructor(private readonly defaults: ComposeOptions = {}) {}

  compose(metadata: PhotoMetadata, place: string | null, options: ComposeOptions = {}): ComposedPost {
    return composePost(metadata, place, {
      maxLength: options.maxLength ?? this.defaults.maxLength,
      caption: options.caption ?? this.defaults.caption,
      mediaPath: options.mediaPath ?? this.defaults.mediaPath,
    });
  }
}
