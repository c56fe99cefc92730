import { z } from 'zod/v4';

// Application
import { type GeocodingPort } from '../../../application/ports/outbound/providers/geocoding.port.js';

// Domain
import {
    type Coordinates,
    coordinatesSchema,
} from '../../../domain/value-objects/coordinates.vo.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';
import { type RateLimiterPort } from '../../../shared/rate-limit/rate-limiter.port.js';

// Constants
const SEARCH_ENDPOINT = '/search';

// Types
export interface NominatimConfiguration {
    baseUrl: string;
    timeoutMs: number;
    userAgent: string;
}

// Schemas
const nominatimResultSchema = z.object({
    display_name: z.string().optional(),
    lat: z.coerce.number(),
    lon: z.coerce.number(),
});

const nominatimResponseSchema = z.array(nominatimResultSchema);

/**
 * Forward geocoding against a Nominatim search endpoint, one request at a time
 */
export class NominatimGeocoder implements GeocodingPort {
    constructor(
        private readonly configuration: NominatimConfiguration,
        private readonly rateLimiter: RateLimiterPort,
        private readonly logger: LoggerPort,
    ) {}

    public async geocode(name: string): Promise<Coordinates | null> {
        try {
            await this.rateLimiter.acquire();

            const response = await fetch(this.buildSearchUrl(name), {
                headers: {
                    Accept: 'application/json',
                    'User-Agent': this.configuration.userAgent,
                },
                signal: AbortSignal.timeout(this.configuration.timeoutMs),
            });

            if (!response.ok) {
                throw new Error(`Geocoding request failed: ${response.status} ${response.statusText}`);
            }

            const [first] = nominatimResponseSchema.parse(await response.json());
            if (!first) {
                this.logger.debug('Place not found', { name });
                return null;
            }

            return coordinatesSchema.parse({ latitude: first.lat, longitude: first.lon });
        } catch (error) {
            this.logger.warn('Failed to geocode place', { error, name });
            return null;
        }
    }

    private buildSearchUrl(name: string): URL {
        const url = new URL(SEARCH_ENDPOINT, this.configuration.baseUrl);

        url.searchParams.append('q', name);
        url.searchParams.append('format', 'jsonv2');
        url.searchParams.append('limit', '1');

        return url;
    }
}
