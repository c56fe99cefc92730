// Domain
import {
    isValidCoordinates,
    type ResolvedLocation,
} from '../../../domain/value-objects/coordinates.vo.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type GeocodingPort } from '../../ports/outbound/providers/geocoding.port.js';

/**
 * Use case for pinning an article to a single coordinate
 * @description Geocodes the candidate names in order and keeps the first one that resolves,
 * so at most one lookup per candidate is made and none after the first hit
 */
export class ResolveEventLocationUseCase {
    constructor(
        private readonly geocoder: GeocodingPort,
        private readonly logger: LoggerPort,
    ) {}

    public async execute(candidateNames: string[]): Promise<null | ResolvedLocation> {
        for (const name of candidateNames) {
            const coordinates = await this.geocoder.geocode(name);

            if (isValidCoordinates(coordinates)) {
                this.logger.debug('Place resolved', { place: name, ...coordinates });
                return {
                    label: name,
                    latitude: coordinates.latitude,
                    longitude: coordinates.longitude,
                };
            }
        }

        this.logger.debug('No candidate place resolved', { candidates: candidateNames });
        return null;
    }
}
