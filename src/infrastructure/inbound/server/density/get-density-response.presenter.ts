// Domain
import { type AggregatedPoint } from '../../../../domain/services/spatial-aggregator.js';

type DensityPointResponse = {
    count: number;
    latitude: number;
    longitude: number;
};

type DensityResponse = {
    items: DensityPointResponse[];
    totalEvents: number;
};

/**
 * Formats grid cells for GET /density, largest cells first
 */
export class GetDensityResponsePresenter {
    present(points: AggregatedPoint[]): DensityResponse {
        const items = points
            .map((point) => ({
                count: point.count,
                latitude: point.latBucket,
                longitude: point.lonBucket,
            }))
            .sort((a, b) => b.count - a.count);

        return {
            items,
            totalEvents: items.reduce((total, item) => total + item.count, 0),
        };
    }
}
