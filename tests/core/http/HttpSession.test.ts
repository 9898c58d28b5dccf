import { DataFormatError, HarnessError, TimeoutError } from '@core/errors.ts';
import { type FetchLike, HttpSession } from '@core/http/HttpSession.ts';
import { Hono } from 'hono';
import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { captureLogs } from '../../helpers/logCapture.ts';

const silent = pino({ level: 'silent' });

function echoApp() {
  const app = new Hono();

  app.all('*', async (c) => {
    const body = c.req.method === 'GET' || c.req.method === 'HEAD' ? '' : await c.req.text();
    return c.json({
      method: c.req.method,
      url: c.req.url,
      accept: c.req.header('accept') ?? null,
      agent: c.req.header('user-agent') ?? null,
      body,
    });
  });

  return app;
}

const echoSchema = z.object({
  method: z.string(),
  url: z.string(),
  accept: z.string().nullable(),
  agent: z.string().nullable(),
  body: z.string(),
});

function session(fetch: FetchLike = echoApp().fetch, timeoutMs = 1000) {
  return new HttpSession({ baseUrl: 'http://api.test/v1/', timeoutMs, fetch, logger: silent });
}

const never = () => new Promise<Response>(() => undefined);

describe('HttpSession', () => {
  it('resolves endpoints against the base URL', () => {
    const http = session();

    expect(http.baseUrl).toBe('http://api.test/v1');
    expect(http.resolveUrl('/users')).toBe('http://api.test/v1/users');
    expect(http.resolveUrl('users/1')).toBe('http://api.test/v1/users/1');
    expect(http.resolveUrl('/posts', { userId: 1, draft: false })).toBe(
      'http://api.test/v1/posts?userId=1&draft=false'
    );
  });

  it('uses absolute URLs as given', () => {
    expect(session().resolveUrl('https://other.test/ip')).toBe('https://other.test/ip');
  });

  it('sends default JSON headers and lets a request override them', async () => {
    const http = session();

    const defaults = (await http.get('/users')).parse(echoSchema);
    const overridden = (
      await http.get('/users', { headers: { Accept: 'text/plain', 'User-Agent': 'harness-test' } })
    ).parse(echoSchema);

    expect(defaults.accept).toBe('application/json');
    expect(overridden).toMatchObject({ accept: 'text/plain', agent: 'harness-test' });
    expect(http.defaultHeaders).toEqual({
      'Content-Type': 'application/json',
      Accept: 'application/json',
    });
  });

  it('serializes JSON bodies', async () => {
    const response = await session().post('/posts', { title: 'hello', userId: 1 });

    expect(response.status).toBe(200);
    expect(response.parse(echoSchema)).toMatchObject({
      method: 'POST',
      url: 'http://api.test/v1/posts',
      body: '{"title":"hello","userId":1}',
    });
  });

  it('sends every verb', async () => {
    const http = session();
    const methods = await Promise.all([
      http.put('/posts/1', {}),
      http.patch('/posts/1', {}),
      http.delete('/posts/1'),
      http.options('/posts'),
    ]);

    expect(methods.map((response) => response.parse(echoSchema).method)).toEqual([
      'PUT',
      'PATCH',
      'DELETE',
      'OPTIONS',
    ]);
  });

  it('keeps the status, headers and timing of the response', async () => {
    const app = new Hono();
    app.get('/missing', (c) => c.json({}, 404));

    const response = await session(app.fetch).get('/missing');

    expect(response.status).toBe(404);
    expect(response.ok).toBe(false);
    expect(response.headers.get('content-type')).toMatch(/^application\/json/);
    expect(response.json()).toEqual({});
    expect(response.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('raises DataFormatError for a body that is not JSON', async () => {
    const app = new Hono();
    app.get('/text', (c) => c.text('plain words'));

    const response = await session(app.fetch).get('/text');

    expect(response.text).toBe('plain words');
    expect(() => response.json()).toThrow(DataFormatError);
  });

  it('raises DataFormatError for a body of the wrong shape', async () => {
    const response = await session().get('/users');

    expect(() => response.parse(z.object({ id: z.number() }))).toThrow(
      'Unexpected response of GET http://api.test/v1/users: id: Required'
    );
  });

  it('times out a request that never answers', async () => {
    const http = session(never, 20);

    const error = await http.get('/slow').then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      timeoutMs: 20,
      message: 'GET http://api.test/v1/slow timed out after 20ms',
    });
  });

  it('honors a per-request timeout', async () => {
    const http = session(never, 10_000);

    await expect(http.get('/slow', { timeoutMs: 10 })).rejects.toMatchObject({ timeoutMs: 10 });
  });

  it('aborts in-flight requests on close and refuses new ones', async () => {
    const http = session(never, 10_000);

    const pending = http.get('/slow');
    http.close();

    await expect(pending).rejects.toThrow(new HarnessError('HTTP session closed'));
    expect(http.isClosed).toBe(true);
    await expect(http.get('/users')).rejects.toThrow(
      'HTTP session is closed; cannot send GET /users'
    );
  });

  it('propagates transport errors', async () => {
    const http = session(() => Promise.reject(new TypeError('fetch failed')));

    await expect(http.get('/users')).rejects.toThrow(new TypeError('fetch failed'));
  });

  it('logs the request and the response status', async () => {
    const { logger, lines } = captureLogs();
    const http = new HttpSession({
      baseUrl: 'http://api.test',
      timeoutMs: 1000,
      fetch: echoApp().fetch,
      logger,
    });

    await http.get('/users');

    expect(lines.map((line) => line.msg)).toEqual([
      'API Request: GET http://api.test/users',
      'API Response: 200',
      'Response body',
    ]);
    expect(lines[1]).toMatchObject({ type: 'api', method: 'GET', statusCode: 200 });
  });
});
