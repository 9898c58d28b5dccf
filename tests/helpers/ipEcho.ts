import { Hono } from 'hono';

/** Documentation address (TEST-NET-3) */
export const STAND_IN_IP = '203.0.113.7';

/**
 * Plain-text echo: every path answers with the caller's address
 */
export function ipEchoApp(): Hono {
  const app = new Hono();

  app.use('*', async (c, next) => {
    c.header('Server', 'stand-in');
    await next();
  });
  app.options('/api', (c) => c.body(null, 200));
  app.get('*', (c) => c.text(`${STAND_IN_IP}\n`));

  return app;
}

/**
 * JSON echo answering `?format=json`
 */
export function ipJsonApp(): Hono {
  const app = new Hono();

  app.get('/', (c) =>
    c.req.query('format') === 'json' ? c.json({ ip: STAND_IN_IP }) : c.text(STAND_IN_IP)
  );

  return app;
}
