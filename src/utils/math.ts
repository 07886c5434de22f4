import { Coordinates } from '../types/nodes';

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

const EARTH_RADIUS_METERS = 6_371_000;

/** Meters spanned by one degree of latitude (roughly constant). */
export const METERS_PER_DEG_LAT = 111_320;

/**
 * Great-circle distance in meters. Edge weights in the store are walking
 * meters, so nearest-node lookups use this same unit.
 */
export function haversineDistance(pointA: Coordinates, pointB: Coordinates): number {
  const latitudeDifference = toRadians(pointB.latitude - pointA.latitude);
  const longitudeDifference = toRadians(pointB.longitude - pointA.longitude);

  const pointALatitudeRadians = toRadians(pointA.latitude);
  const pointBLatitudeRadians = toRadians(pointB.latitude);

  const a =
    Math.sin(latitudeDifference / 2) ** 2 +
    Math.cos(pointALatitudeRadians) *
      Math.cos(pointBLatitudeRadians) *
      Math.sin(longitudeDifference / 2) ** 2;

  const angularDistance = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * angularDistance;
}

/**
 * Rounds to `decimals` places. Exact halves go to the even neighbour, so
 * 10.125 -> 10.12 and 3.75 -> 3.8.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const lower = Math.floor(scaled);
  const fraction = scaled - lower;
  if (fraction === 0.5) {
    return (lower % 2 === 0 ? lower : lower + 1) / factor;
  }
  return Math.round(scaled) / factor;
}
