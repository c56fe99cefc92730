import { Hono } from 'hono';

export const createHealthRouter = () => {
    const app = new Hono();

    app.get('/', (c) => c.json({ status: 'ok' }));

    return app;
};
