import { type Coordinates } from '../../../../domain/value-objects/coordinates.vo.js';

/**
 * Geocoding port
 */
export interface GeocodingPort {
    /**
     * Look up a place name. Resolves to null when nothing is found or the lookup failed.
     */
    geocode(name: string): Promise<Coordinates | null>;
}
