/**
 * Types for device coordinates and reverse-geocoded places
 */

export interface Coordinate {
  latitude: number;
  longitude: number;
}

export interface Placemark {
  houseNumber?: string;
  street?: string;
  locality?: string;
  region?: string;
  postalCode?: string;
}

export interface ReverseGeocoder {
  reverseGeocode(coordinate: Coordinate, signal?: AbortSignal): Promise<Placemark | null>;
}
