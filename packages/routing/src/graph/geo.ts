/**
 * Great-circle distance and bearing on a spherical Earth.
 */

import type { Coordinate } from "@streetwise/types";

/** Earth radius used for all distances, in miles */
export const EARTH_RADIUS_MILES = 3963;

const toRad = Math.PI / 180;

/**
 * Haversine distance between two coordinates in miles.
 */
export function haversineMiles(a: Coordinate, b: Coordinate): number {
  const lat1 = a.lat * toRad;
  const lat2 = b.lat * toRad;
  const sinHalfLat = Math.sin(((b.lat - a.lat) * toRad) / 2);
  const sinHalfLng = Math.sin(((b.lng - a.lng) * toRad) / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(lat1) * Math.cos(lat2) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_MILES * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Initial compass bearing from a to b in degrees (0=N, 90=E), in (-180, 180].
 */
export function initialBearing(a: Coordinate, b: Coordinate): number {
  const dLng = (b.lng - a.lng) * toRad;
  const lat1 = a.lat * toRad;
  const lat2 = b.lat * toRad;
  const y = Math.sin(dLng) * Math.cos(lat2);
  const x =
    Math.cos(lat1) * Math.sin(lat2) -
    Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);
  return normalizeAngle((Math.atan2(y, x) * 180) / Math.PI);
}

/**
 * Fold any angle in degrees into (-180, 180].
 */
export function normalizeAngle(degrees: number): number {
  let angle = degrees % 360;
  if (angle > 180) angle -= 360;
  if (angle <= -180) angle += 360;
  return angle;
}
