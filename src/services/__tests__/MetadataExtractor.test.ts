import { describe, expect, it, vi } from 'vitest';
import { ExtractionError } from '../../utils/errors';
import {
  type ExifReader,
  MetadataExtractor,
  parseCoordinate,
  parseExifDate,
} from '../MetadataExtractor';

function readerReturning(tags: Record<string, unknown>): ExifReader {
  return { read: vi.fn(async () => tags) };
}

function readerThrowing(error: unknown): ExifReader {
  return {
    read: vi.fn(async () => {
      throw error;
    }),
  };
}

describe('MetadataExtractor', () => {
  it('should extract time, coordinates and description', async () => {
    const extractor = new MetadataExtractor(readerReturning({
      DateTimeOriginal: '2024:03:01 10:00:00',
      GPSLatitude: 37.7749,
      GPSLatitudeRef: 'N',
      GPSLongitude: 122.4194,
      GPSLongitudeRef: 'W',
      ImageDescription: '  Fog rolling   in ',
    }));

    const metadata = await extractor.extract('/photos/a.jpg');

    expect(metadata.captureTime).toEqual(new Date(2024, 2, 1, 10, 0, 0));
    expect(metadata.coordinates).toEqual({ latitude: 37.7749, longitude: -122.4194 });
    expect(metadata.description).toBe('Fog rolling in');
  });

  it('should return empty metadata when there are no tags', async () => {
    const extractor = new MetadataExtractor(readerReturning({}));

    await expect(extractor.extract('/photos/a.jpg')).resolves.toEqual({
      captureTime: null,
      coordinates: null,
      description: null,
    });
  });

  it('should fall back to later date tags when the first is malformed', async () => {
    const extractor = new MetadataExtractor(readerReturning({
      DateTimeOriginal: '0000:00:00 00:00:00',
      CreateDate: '2023:12:24 18:30:05',
    }));

    const metadata = await extractor.extract('/photos/a.jpg');

    expect(metadata.captureTime).toEqual(new Date(2023, 11, 24, 18, 30, 5));
  });

  it('should drop out-of-range coordinates but keep the other fields', async () => {
    const extractor = new MetadataExtractor(readerReturning({
      DateTimeOriginal: '2024:03:01 10:00:00',
      GPSLatitude: 123.4,
      GPSLongitude: 10,
    }));

    const metadata = await extractor.extract('/photos/a.jpg');

    expect(metadata.coordinates).toBeNull();
    expect(metadata.captureTime).toEqual(new Date(2024, 2, 1, 10, 0, 0));
  });

  it('should treat 0,0 as no fix', async () => {
    const extractor = new MetadataExtractor(readerReturning({ GPSLatitude: 0, GPSLongitude: 0 }));

    expect((await extractor.extract('/photos/a.jpg')).coordinates).toBeNull();
  });

  it('should parse DMS strings with hemisphere refs', async () => {
    const extractor = new MetadataExtractor(readerReturning({
      GPSLatitude: '33 deg 51\' 54.00" S',
      GPSLatitudeRef: 'South',
      GPSLongitude: '151 deg 12\' 36.00" E',
      GPSLongitudeRef: 'East',
    }));

    const metadata = await extractor.extract('/photos/a.jpg');

    expect(metadata.coordinates).toEqual({ latitude: -33.865, longitude: 151.21 });
  });

  it('should ignore placeholder descriptions written by cameras', async () => {
    const extractor = new MetadataExtractor(readerReturning({
      ImageDescription: 'OLYMPUS DIGITAL CAMERA',
      'Caption-Abstract': 'Harbour at dusk',
    }));

    expect((await extractor.extract('/photos/a.jpg')).description).toBe('Harbour at dusk');
  });

  it('should treat corrupt metadata as absent', async () => {
    const extractor = new MetadataExtractor(
      readerThrowing(new ExtractionError('corrupt-metadata', 'bad IFD'))
    );

    await expect(extractor.extract('/photos/a.jpg')).resolves.toEqual({
      captureTime: null,
      coordinates: null,
      description: null,
    });
  });

  it('should rethrow unreadable files', async () => {
    const extractor = new MetadataExtractor(
      readerThrowing(new ExtractionError('unreadable-file', 'Cannot read /photos/a.jpg'))
    );

    await expect(extractor.extract('/photos/a.jpg')).rejects.toMatchObject({ kind: 'unreadable-file' });
  });

  it('should wrap unexpected reader failures as unreadable files', async () => {
    const extractor = new MetadataExtractor(readerThrowing(new Error('EACCES')));

    const error = await extractor.extract('/photos/a.jpg').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ kind: 'unreadable-file', message: 'Cannot read /photos/a.jpg' });
  });
});

describe('parseExifDate', () => {
  it('should read the EXIF format as local wall-clock time', () => {
    expect(parseExifDate('2024:03:01 10:00:00')).toEqual(new Date(2024, 2, 1, 10, 0, 0));
  });

  it('should accept an ISO-like separator and fractional seconds', () => {
    expect(parseExifDate('2024:03:01T10:00:00.250')).toEqual(new Date(2024, 2, 1, 10, 0, 0));
  });

  it('should reject impossible dates', () => {
    expect(parseExifDate('2024:02:31 10:00:00')).toBeNull();
    expect(parseExifDate('2024:13:01 10:00:00')).toBeNull();
    expect(parseExifDate('not a date')).toBeNull();
    expect(parseExifDate(20240301)).toBeNull();
  });

  it('should pass valid Date objects through', () => {
    const date = new Date(2020, 0, 2, 3, 4, 5);
    expect(parseExifDate(date)).toBe(date);
    expect(parseExifDate(new Date('garbage'))).toBeNull();
  });
});

describe('parseCoordinate', () => {
  it('should accept numbers, arrays and decimal strings', () => {
    expect(parseCoordinate(12.5)).toBe(12.5);
    expect(parseCoordinate([10, 30, 0])).toBe(10.5);
    expect(parseCoordinate('-45.25')).toBe(-45.25);
  });

  it('should reject garbage', () => {
    expect(parseCoordinate('north-ish')).toBeNull();
    expect(parseCoordinate([])).toBeNull();
    expect(parseCoordinate(Number.NaN)).toBeNull();
    expect(parseCoordinate(null)).toBeNull();
  });
});
