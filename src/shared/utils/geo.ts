import type { Location } from "../types";
import { ValidationError } from "../errors";

const EARTH_RADIUS_KM = 6371;

/** Average urban ambulance speed used for rough ETAs */
const AVERAGE_SPEED_KMH = 40;

function toRad(deg: number): number {
  return deg * (Math.PI / 180);
}

function toDeg(rad: number): number {
  return rad * (180 / Math.PI);
}

export function isValidCoordinate(lat: number, lng: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    lat >= -90 &&
    lat <= 90 &&
    lng >= -180 &&
    lng <= 180
  );
}

export function assertValidCoordinate(lat: number, lng: number): void {
  if (!isValidCoordinate(lat, lng)) {
    throw new ValidationError(`Invalid coordinates: ${lat}, ${lng}`);
  }
}

/**
 * Great-circle distance between two points using the Haversine formula
 * Returns distance in kilometers
 */
export function haversineKm(from: Location, to: Location): number {
  const dLat = toRad(to.lat - from.lat);
  const dLng = toRad(to.lng - from.lng);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRad(from.lat)) *
      Math.cos(toRad(to.lat)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

/**
 * Initial bearing from one point to another, in degrees [0, 360)
 */
export function bearingDegrees(from: Location, to: Location): number {
  const lat1 = toRad(from.lat);
  const lat2 = toRad(to.lat);
  const dLng = toRad(to.lng - from.lng);

  const y = Math.sin(dLng) * Math.cos(lat2);
  const x =
    Math.cos(lat1) * Math.sin(lat2) -
    Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);

  return (toDeg(Math.atan2(y, x)) + 360) % 360;
}

/**
 * minLng > maxLng means the box wraps across the antimeridian
 */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/**
 * Smallest lat/lng box containing every point within radiusKm of center.
 * A circle reaching a pole spans all longitudes.
 */
export function boundingBox(center: Location, radiusKm: number): BoundingBox {
  const angular = radiusKm / EARTH_RADIUS_KM;
  const latDelta = toDeg(angular);
  const minLat = center.lat - latDelta;
  const maxLat = center.lat + latDelta;

  if (minLat <= -90 || maxLat >= 90) {
    return {
      minLat: Math.max(-90, minLat),
      maxLat: Math.min(90, maxLat),
      minLng: -180,
      maxLng: 180,
    };
  }

  const lngDelta = toDeg(Math.asin(Math.sin(angular) / Math.cos(toRad(center.lat))));
  if (lngDelta >= 180) {
    return { minLat, maxLat, minLng: -180, maxLng: 180 };
  }

  let minLng = center.lng - lngDelta;
  let maxLng = center.lng + lngDelta;
  if (minLng < -180) minLng += 360;
  if (maxLng > 180) maxLng -= 360;

  return { minLat, maxLat, minLng, maxLng };
}

export function isPointInBounds(point: Location, bounds: BoundingBox): boolean {
  if (point.lat < bounds.minLat || point.lat > bounds.maxLat) return false;
  if (bounds.minLng <= bounds.maxLng) {
    return point.lng >= bounds.minLng && point.lng <= bounds.maxLng;
  }
  return point.lng >= bounds.minLng || point.lng <= bounds.maxLng;
}

/**
 * Rough driving ETA in minutes at urban ambulance speed, never below 5
 */
export function estimateEtaMinutes(distanceKm: number): number {
  return Math.max(5, Math.floor((distanceKm / AVERAGE_SPEED_KMH) * 60));
}
