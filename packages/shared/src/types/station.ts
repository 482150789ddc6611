/**
 * Station Types
 */

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface Station {
  readonly name: string;
  readonly id: string;       // Frost source id, e.g. "SN60990"
  readonly lat?: number;
  readonly lon?: number;
}

/**
 * Coordinates of a station, or null when either one is missing
 */
export function stationCoordinates(station: Station): Coordinates | null {
  if (station.lat === undefined || station.lon === undefined) return null;
  return { lat: station.lat, lon: station.lon };
}
