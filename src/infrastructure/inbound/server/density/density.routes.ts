import { Hono } from 'hono';

import { type GetDensityController } from './get-density.controller.js';

export const createDensityRouter = (getDensityController: GetDensityController) => {
    const app = new Hono();

    app.get('/', async (c) => {
        const response = await getDensityController.getDensity({
            minCount: c.req.query('minCount'),
        });

        return c.json(response);
    });

    return app;
};
