import { http, HttpResponse } from 'msw';

const PLACES: Record<string, { lat: string; lon: string }> = {
    boston: { lat: '42.3601', lon: '-71.0589' },
    chicago: { lat: '41.8781', lon: '-87.6298' },
};

export const nominatimSearchResolver = http.get(
    'https://geocoder.test.local/search',
    ({ request }) => {
        const query = new URL(request.url).searchParams.get('q')?.toLowerCase() ?? '';
        const place = PLACES[query];

        return HttpResponse.json(place ? [{ display_name: query, ...place }] : []);
    },
);
