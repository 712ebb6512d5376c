import crypto from 'crypto';
import { createReadStream } from 'fs';
import path from 'path';
import type { Coordinates } from '../types/Photo';

/**
 * Content-based identity of a photograph
 * Renaming or moving the file keeps the identity, so a moved photo is never published twice
 */
export async function generatePhotoIdentity(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256');
  const stream = createReadStream(filePath);

  for await (const chunk of stream) {
    hash.update(chunk);
  }

  return hash.digest('hex');
}

/**
 * Identity for a file that could not be read, so the failure can still be recorded
 */
export function generatePathIdentity(filePath: string): string {
  const digest = crypto
    .createHash('sha256')
    .update(path.resolve(filePath))
    .digest('hex');
  return `path:${digest}`;
}

/**
 * Round a coordinate to `precision` decimal places
 * 3 places is roughly 100m, enough to fold one outing's photos onto one lookup
 */
export function roundCoordinate(value: number, precision: number): number {
  const factor = 10 ** precision;
  const rounded = Math.round(value * factor) / factor;
  // Math.round can produce -0, which would print as a different key
  return rounded === 0 ? 0 : rounded;
}

/**
 * Cache key for a coordinate pair at the given precision
 */
export function generateCoordinateKey(coordinates: Coordinates, precision: number): string {
  const lat = roundCoordinate(coordinates.latitude, precision).toFixed(precision);
  const lon = roundCoordinate(coordinates.longitude, precision).toFixed(precision);
  return `${lat},${lon}`;
}
