import { type Coordinates } from '../value-objects/coordinates.vo.js';

/**
 * Number of events falling in one grid cell
 */
export interface AggregatedPoint {
    count: number;
    latBucket: number;
    lonBucket: number;
}

const MICRODEGREES = 1_000_000;
const CELLS_PER_DEGREE = 1000;

/**
 * Snaps a coordinate to the south-west corner of its 0.001° cell (about 111 m of latitude).
 * The value is first rounded to the microdegree so binary noise such as 1.2339999999 stays in
 * the cell of 1.234.
 */
export const toBucket = (value: number): number => {
    const microdegrees = Math.round(value * MICRODEGREES);
    const cell = Math.floor(microdegrees / (MICRODEGREES / CELLS_PER_DEGREE));
    return cell / CELLS_PER_DEGREE || 0;
};

/**
 * Groups coordinates by grid cell and counts them. Points come out in first-seen order,
 * which callers must not rely on.
 */
export const aggregateByBucket = (locations: Iterable<Coordinates>): AggregatedPoint[] => {
    const points = new Map<string, AggregatedPoint>();

    for (const { latitude, longitude } of locations) {
        const latBucket = toBucket(latitude);
        const lonBucket = toBucket(longitude);
        const key = `${latBucket}:${lonBucket}`;
        const point = points.get(key);

        if (point) {
            point.count++;
        } else {
            points.set(key, { count: 1, latBucket, lonBucket });
        }
    }

    return Array.from(points.values());
};
