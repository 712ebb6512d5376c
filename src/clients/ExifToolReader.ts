import { ExifDateTime, ExifTool } from 'exiftool-vendored';
import fs from 'fs/promises';
import type { ExifReader } from '../services/MetadataExtractor';
import { ExtractionError } from '../utils/errors';

/**
 * EXIF reader backed by exiftool (via exiftool-vendored)
 * Date objects are flattened back to their raw EXIF strings so the extractor sees plain tags.
 */
export class ExifToolReader implements ExifReader {
  private readonly exiftool: ExifTool;

  constructor(exiftool?: ExifTool) {
    this.exiftool = exiftool ?? new ExifTool({ taskTimeoutMillis: 20000 });
  }

  async read(filePath: string): Promise<Record<string, unknown>> {
    try {
      await fs.access(filePath, fs.constants.R_OK);
    } catch (error) {
      throw new ExtractionError('unreadable-file', `Cannot read ${filePath}`, { cause: error });
    }

    let entries: Array<[string, unknown]>;
    try {
      const tags = await this.exiftool.read(filePath);
      entries = Object.entries(tags);
    } catch (error) {
      throw new ExtractionError('corrupt-metadata', `exiftool could not decode ${filePath}`, { cause: error });
    }

    const raw: Record<string, unknown> = {};
    for (const [key, value] of entries) {
      raw[key] = normalizeTagValue(value);
    }

    const errors = raw.errors;
    if (Array.isArray(errors) && errors.length > 0 && raw.DateTimeOriginal === undefined
      && raw.GPSLatitude === undefined) {
      throw new ExtractionError('corrupt-metadata', `exiftool reported: ${errors.join('; ')}`);
    }

    return raw;
  }

  /**
   * Stop the exiftool child processes
   */
  async close(): Promise<void> {
    await this.exiftool.end();
  }
}

function normalizeTagValue(value: unknown): unknown {
  if (value instanceof ExifDateTime) {
    return value.rawValue ?? value.toDate();
  }
  // ExifDate and ExifTime carry the original string as well
  if (typeof value === 'object' && value !== null && 'rawValue' in value
    && typeof value.rawValue === 'string') {
    return value.rawValue;
  }
  return value;
}
