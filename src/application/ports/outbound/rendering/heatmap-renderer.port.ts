import { type AggregatedPoint } from '../../../../domain/services/spatial-aggregator.js';

/**
 * Heat map renderer port
 */
export interface HeatmapRendererPort {
    /**
     * Render the points and return a handle to the produced artifact
     */
    render(points: AggregatedPoint[]): Promise<string>;
}
