import type { Coordinates, PhotoMetadata } from '../types/Photo';
import { ExtractionError } from '../utils/errors';
import { createLogger } from '../utils/logger';

/**
 * Reads the raw EXIF tag mapping of a file.
 * Implementations throw ExtractionError('unreadable-file') when the file cannot be opened
 * and ExtractionError('corrupt-metadata') when its metadata block cannot be decoded.
 */
export interface ExifReader {
  read(filePath: string): Promise<Record<string, unknown>>;
}

const COORDINATE_DECIMALS = 6;

const DATE_TAGS = ['DateTimeOriginal', 'CreateDate', 'DateTimeDigitized'] as const;
const DESCRIPTION_TAGS = ['ImageDescription', 'Description', 'Caption-Abstract'] as const;

// Descriptions some cameras write into every file
const PLACEHOLDER_DESCRIPTIONS = new Set([
  'olympus digital camera',
  'sony dsc',
  'default',
  'image',
  'digital camera',
]);

const EXIF_DATE_RE =
  /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?$/;

const DMS_RE = /^(-?\d+(?:\.\d+)?)\s*(?:deg|°)?\s*(?:(\d+(?:\.\d+)?)\s*'\s*)?(?:(\d+(?:\.\d+)?)\s*"\s*)?([NSEW])?$/i;

/**
 * Turns raw EXIF tags into the pipeline's metadata.
 * Malformed individual fields are dropped with a warning; only an unreadable file is an error.
 */
export class MetadataExtractor {
  private readonly logger = createLogger({ component: 'MetadataExtractor' });

  constructor(private readonly reader: ExifReader) {}

  async extract(filePath: string): Promise<PhotoMetadata> {
    let tags: Record<string, unknown>;

    try {
      tags = await this.reader.read(filePath);
    } catch (error) {
      if (error instanceof ExtractionError && error.kind === 'corrupt-metadata') {
        this.logger.warn({ filePath, error: error.message }, 'Corrupt metadata, continuing without it');
        return emptyMetadata();
      }
      if (error instanceof ExtractionError) {
        throw error;
      }
      throw new ExtractionError('unreadable-file', `Cannot read ${filePath}`, { cause: error });
    }

    return {
      captureTime: this.extractCaptureTime(filePath, tags),
      coordinates: this.extractCoordinates(filePath, tags),
      description: extractDescription(tags),
    };
  }

  private extractCaptureTime(filePath: string, tags: Record<string, unknown>): Date | null {
    for (const tag of DATE_TAGS) {
      const value = tags[tag];
      if (value === undefined || value === null || value === '') continue;

      const date = parseExifDate(value);
      if (date) return date;

      this.logger.warn({ filePath, tag, value }, 'Ignoring malformed capture date');
    }
    return null;
  }

  private extractCoordinates(filePath: string, tags: Record<string, unknown>): Coordinates | null {
    const rawLat = tags.GPSLatitude;
    const rawLon = tags.GPSLongitude;
    if (rawLat === undefined || rawLat === null || rawLon === undefined || rawLon === null) {
      return null;
    }

    const latitude = applyHemisphere(parseCoordinate(rawLat), tags.GPSLatitudeRef, 'S');
    const longitude = applyHemisphere(parseCoordinate(rawLon), tags.GPSLongitudeRef, 'W');

    if (latitude === null || longitude === null
      || Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
      this.logger.warn({ filePath, rawLat, rawLon }, 'Ignoring malformed GPS coordinates');
      return null;
    }

    // Phones without a fix often write 0,0
    if (latitude === 0 && longitude === 0) {
      return null;
    }

    return {
      latitude: roundTo(latitude, COORDINATE_DECIMALS),
      longitude: roundTo(longitude, COORDINATE_DECIMALS),
    };
  }
}

function emptyMetadata(): PhotoMetadata {
  return { captureTime: null, coordinates: null, description: null };
}

/**
 * Parse an EXIF date as the wall-clock time shown on the camera
 */
export function parseExifDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') return null;

  const m = EXIF_DATE_RE.exec(value.trim());
  if (!m) return null;

  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  if (year === 0 || month < 1 || month > 12 || day < 1 || day > 31
    || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(year, month - 1, day, hour, minute, second);
  // Rejects rollovers such as 2024:02:31
  if (date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Degrees from a number, a decimal or DMS string, or a [d, m, s] array
 */
export function parseCoordinate(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (Array.isArray(value)) {
    const parts = value.map(part => (typeof part === 'number' ? part : Number(part)));
    if (parts.length === 0 || parts.length > 3 || parts.some(p => !Number.isFinite(p))) {
      return null;
    }
    const [d, m = 0, s = 0] = parts;
    const magnitude = Math.abs(d) + m / 60 + s / 3600;
    return d < 0 ? -magnitude : magnitude;
  }

  if (typeof value === 'string') {
    const match = DMS_RE.exec(value.trim());
    if (!match) return null;

    const d = Number(match[1]);
    const m = match[2] ? Number(match[2]) : 0;
    const s = match[3] ? Number(match[3]) : 0;
    const magnitude = Math.abs(d) + m / 60 + s / 3600;
    const negative = d < 0 || /[SW]/i.test(match[4] ?? '');
    return negative ? -magnitude : magnitude;
  }

  return null;
}

function applyHemisphere(value: number | null, ref: unknown, negativeRef: 'S' | 'W'): number | null {
  if (value === null) return null;
  if (typeof ref !== 'string' || ref.trim() === '') return value;

  const first = ref.trim()[0].toUpperCase();
  if (first === negativeRef) return -Math.abs(value);
  if (first === 'N' || first === 'E') return Math.abs(value);
  return value;
}

function extractDescription(tags: Record<string, unknown>): string | null {
  for (const tag of DESCRIPTION_TAGS) {
    const value = tags[tag];
    if (typeof value !== 'string') continue;

    const text = value.replace(/\s+/g, ' ').trim();
    if (text && !PLACEHOLDER_DESCRIPTIONS.has(text.toLowerCase())) {
      return text;
    }
  }
  return null;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
