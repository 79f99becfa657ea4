/**
 * Reverse geocoding: turn coordinates into a short street address
 * using OpenStreetMap Nominatim.
 */

import type { Coordinate, Placemark, ReverseGeocoder } from '../types/location.js';
import { GeocodingError } from '../errors.js';
import { DEFAULT_GEOCODER_URL } from '../config.js';

const USER_AGENT = 'ScavengerHunt-CLI/0.1';

interface NominatimAddress {
  house_number?: string;
  road?: string;
  pedestrian?: string;
  city?: string;
  town?: string;
  village?: string;
  hamlet?: string;
  state?: string;
  postcode?: string;
}

export class NominatimGeocoder implements ReverseGeocoder {
  constructor(private readonly baseUrl: string = DEFAULT_GEOCODER_URL) {}

  async reverseGeocode(coordinate: Coordinate, signal?: AbortSignal): Promise<Placemark | null> {
    const url = `${this.baseUrl}/reverse?lat=${coordinate.latitude}&lon=${coordinate.longitude}&format=json&addressdetails=1`;
    const res = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal,
    });

    if (!res.ok) throw new GeocodingError(`Nominatim ${res.status}`, res.status);

    const data: unknown = await res.json();
    if (typeof data !== 'object' || data === null || !('address' in data)) return null;

    const address = readAddress(data.address);
    if (!address) return null;

    return toPlacemark(address);
  }
}

function readAddress(value: unknown): NominatimAddress | null {
  if (typeof value !== 'object' || value === null) return null;
  const fields = value as Record<string, unknown>;
  const address: NominatimAddress = {};
  for (const key of ['house_number', 'road', 'pedestrian', 'city', 'town', 'village', 'hamlet', 'state', 'postcode'] as const) {
    const field = fields[key];
    if (typeof field === 'string' && field.trim()) address[key] = field.trim();
  }
  return address;
}

function toPlacemark(address: NominatimAddress): Placemark {
  const placemark: Placemark = {};
  const street = address.road ?? address.pedestrian;
  const locality = address.city ?? address.town ?? address.village ?? address.hamlet;
  if (address.house_number) placemark.houseNumber = address.house_number;
  if (street) placemark.street = street;
  if (locality) placemark.locality = locality;
  if (address.state) placemark.region = address.state;
  if (address.postcode) placemark.postalCode = address.postcode;
  return placemark;
}

/**
 * "12 Main St • Springfield, IL • 62701"; null when nothing is known
 */
export function formatAddress(placemark: Placemark | null): string | null {
  if (!placemark) return null;
  const line1 = [placemark.houseNumber, placemark.street].filter(Boolean).join(' ');
  const line2 = [placemark.locality, placemark.region].filter(Boolean).join(', ');
  const line3 = placemark.postalCode ?? '';
  const address = [line1, line2, line3].filter(line => line.length > 0).join(' • ');
  return address || null;
}
