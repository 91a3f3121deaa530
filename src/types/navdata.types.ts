/**
 * Navigation database model type definitions
 */
import type { LatLon } from '../lib/geo';

export interface BoundingBox {
  left: number;
  right: number;
  bottom: number;
  top: number;
}

export interface Airport {
  id: number;
  ident: string;
  position: LatLon;
  bounds?: BoundingBox;
}

/**
 * Finds the airport whose bounding box contains a position
 */
export interface AirportLookup {
  findContaining(position: LatLon): Promise<Airport | null>;
}
