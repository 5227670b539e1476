/**
 * Great-circle distance helpers.
 *
 * @module geo/distance
 */

import type { Coordinates } from '../schemas/common.js';

/** Mean earth radius in meters */
export const EARTH_RADIUS_METERS = 6371000;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Straight-line (haversine) distance between two points.
 *
 * @returns Distance in meters
 *
 * @example
 * ```typescript
 * haversineDistance({ lat: 0, lng: 0 }, { lat: 0, lng: 1 }); // ~111195
 * ```
 */
export function haversineDistance(from: Coordinates, to: Coordinates): number {
  const lat1 = toRadians(from.lat);
  const lat2 = toRadians(to.lat);
  const dLat = lat2 - lat1;
  const dLng = toRadians(to.lng - from.lng);

  const a = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;
  const c = 2 * Math.asin(Math.sqrt(a));

  return EARTH_RADIUS_METERS * c;
}

/**
 * Round to two decimal places.
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
