/**
 * Latitude/longitude in radians
 */

import type { Vec3 } from '../num/vec3.js';

export interface LatLng {
  lat: number;
  lng: number;
}

const DEG_TO_RAD = Math.PI / 180;

export function latLng(lat: number, lng: number): LatLng {
  return { lat, lng };
}

export function latLngFromDegrees(latDeg: number, lngDeg: number): LatLng {
  return { lat: latDeg * DEG_TO_RAD, lng: lngDeg * DEG_TO_RAD };
}

export function latLngToDegrees(ll: LatLng): { lat: number; lng: number } {
  return { lat: ll.lat / DEG_TO_RAD, lng: ll.lng / DEG_TO_RAD };
}

/**
 * Latitude within [-π/2, π/2] and longitude within [-π, π]
 */
export function isValidLatLng(ll: LatLng): boolean {
  return Math.abs(ll.lat) <= Math.PI / 2 && Math.abs(ll.lng) <= Math.PI;
}

/** Unit-length direction */
export function latLngToPoint(ll: LatLng): Vec3 {
  const cosLat = Math.cos(ll.lat);
  return [Math.cos(ll.lng) * cosLat, Math.sin(ll.lng) * cosLat, Math.sin(ll.lat)];
}

/**
 * Lat/lng of a direction of any non-zero length
 */
export function latLngFromPoint(p: Vec3): LatLng {
  return {
    lat: Math.atan2(p[2], Math.hypot(p[0], p[1])),
    lng: Math.atan2(p[1], p[0]),
  };
}
