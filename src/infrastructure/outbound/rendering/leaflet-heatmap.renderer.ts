import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

// Application
import { type HeatmapRendererPort } from '../../../application/ports/outbound/rendering/heatmap-renderer.port.js';

// Domain
import { type AggregatedPoint } from '../../../domain/services/spatial-aggregator.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

export interface LeafletHeatmapConfiguration {
    outputFile: string;
}

export const HEATMAP_VIEW = {
    blur: 14,
    center: [-15.78, -47.93],
    maxZoom: 6,
    radius: 18,
    zoom: 3,
} as const;

const LEAFLET_VERSION = '1.9.4';
const LEAFLET_HEAT_VERSION = '0.2.0';

/**
 * Heat layer rows, `[latitude, longitude, intensity]`
 */
export const toHeatLayerData = (points: AggregatedPoint[]): [number, number, number][] =>
    points.map((point) => [point.latBucket, point.lonBucket, point.count]);

export const buildHeatmapPage = (points: AggregatedPoint[]): string => {
    const data = toHeatLayerData(points);
    const maxIntensity = data.reduce((max, [, , count]) => Math.max(max, count), 1);
    const options = {
        blur: HEATMAP_VIEW.blur,
        max: maxIntensity,
        maxZoom: HEATMAP_VIEW.maxZoom,
        radius: HEATMAP_VIEW.radius,
    };

    return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Crime density</title>
<link rel="stylesheet" href="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css">
<style>html, body, #map { height: 100%; margin: 0; }</style>
</head>
<body>
<div id="map"></div>
<script src="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js"></script>
<script src="https://unpkg.com/leaflet.heat@${LEAFLET_HEAT_VERSION}/dist/leaflet-heat.js"></script>
<script>
const map = L.map('map').setView(${JSON.stringify(HEATMAP_VIEW.center)}, ${HEATMAP_VIEW.zoom});
L.tileLayer('https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png', {
  attribution: '&copy; OpenStreetMap contributors',
}).addTo(map);
L.heatLayer(${JSON.stringify(data)}, ${JSON.stringify(options)}).addTo(map);
</script>
</body>
</html>
`;
};

/**
 * Writes a standalone Leaflet page showing the density points
 */
export class LeafletHeatmapRenderer implements HeatmapRendererPort {
    constructor(
        private readonly configuration: LeafletHeatmapConfiguration,
        private readonly logger: LoggerPort,
    ) {}

    public async render(points: AggregatedPoint[]): Promise<string> {
        const outputFile = resolve(this.configuration.outputFile);

        await mkdir(dirname(outputFile), { recursive: true });
        await writeFile(outputFile, buildHeatmapPage(points), 'utf8');

        this.logger.info('Heat map written', { outputFile, points: points.length });

        return outputFile;
    }
}
