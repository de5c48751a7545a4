import { createHash } from 'node:crypto';

const COORDINATE_PRECISION = 6;

/**
 * Stable identifier for rows that carry coordinates but no entity id.
 * Coordinates are rounded so "12.90" and "12.9" resolve to the same entity.
 */
export function synthesizeEntityId(latitude: number, longitude: number): string {
  const key = `${latitude.toFixed(COORDINATE_PRECISION)},${longitude.toFixed(COORDINATE_PRECISION)}`;
  const digest = createHash('sha256').update(key).digest('hex');
  return `geo-${digest.slice(0, 16)}`;
}
