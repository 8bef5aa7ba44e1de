/**
 * Integration Tests — Access Logger Middleware
 *
 * Runs real HTTP requests through a small Express app mounted the way
 * createApp() mounts it (requestTimer, access logger, compression, JSON
 * parser), via Supertest (in-memory, ephemeral port, no outside network).
 * This is where ExpressRenderContext is exercised against genuine req/res
 * objects: query splitting, path decoding, cookies, forwarded IPs, request
 * Content-Length and the counted response body.
 *
 * Lines are written on the response's 'finish' event, which can land after
 * Supertest has resolved, so each test awaits the `logged` promise that the
 * test's onLog resolves instead of inspecting the mock straight away.
 */
import {
  AccessLogService,
  type OnLog,
  type Skipper,
} from '@application/services/AccessLogService';
import { logger } from '@core/logger';
import { ExpressRenderContext } from '@infrastructure/context/ExpressRenderContext';
import { accessLogger } from '@interfaces/http/middleware/accessLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import compression from 'compression';
import express from 'express';
import request from 'supertest';

function setup(format: string, skipper?: Skipper) {
  let resolveLine: (line: string) => void = () => undefined;
  const logged = new Promise<string>((resolve) => {
    resolveLine = resolve;
  });
  const onLog = jest.fn<ReturnType<OnLog>, Parameters<OnLog>>((line) => resolveLine(line));
  const service = new AccessLogService({ format, onLog, skipper });

  const app = express();
  app.use(requestTimer);
  app.use(accessLogger(service));
  app.use(compression());
  app.use(express.json());

  app.get('/items', (_req, res) => {
    res.status(201).set('X-Trace', 'trace-1').send('hello');
  });
  app.post('/items', (_req, res) => {
    res.sendStatus(204);
  });
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });
  app.get('/slow', async (_req, res) => {
    await new Promise((resolve) => setTimeout(resolve, 50));
    res.send('done');
  });
  app.get('/boom', () => {
    throw new Error('boom');
  });
  app.get('/big', (_req, res) => {
    res.type('text/plain').send('x'.repeat(5000));
  });
  app.get('/stream', (_req, res) => {
    res.type('text/plain');
    res.write('abc');
    res.end('de');
  });
  app.get('/hang', () => undefined);

  return { app, logged, onLog };
}

describe('accessLogger middleware', () => {
  it('should render request, response, cookie and header fields', async () => {
    const { app, logged, onLog } = setup(
      '{method} {path} {query} {uri} {status} {size} {size-human} ' +
        '{>X-Request-Id} {<X-Trace} {~session} {~missing} {scheme} {proto} {real-ip}',
    );

    await request(app)
      .get('/items?page=2')
      .set('X-Request-Id', 'req-1')
      .set('Cookie', 'session=abc123; theme=dark')
      .set('X-Forwarded-For', '203.0.113.9, 10.0.0.1');

    const line = await logged;
    expect(line).toBe(
      'GET /items page=2 /items?page=2 201 5 5B req-1 trace-1 abc123  HTTP HTTP/1.1 203.0.113.9',
    );
    expect(onLog).toHaveBeenCalledWith(line, expect.any(ExpressRenderContext));
  });

  it('should report the request body size and no response body for a 204', async () => {
    const { app, logged } = setup(
      '{method} {payload-size} {payload-size-human} {status} {size} {size-human}',
    );

    await request(app).post('/items').send({ name: 'widget' });

    expect(await logged).toBe('POST 17 17B 204 0 0B');
  });

  it('should fall back to X-Real-IP when there is no X-Forwarded-For', async () => {
    const { app, logged } = setup('{real-ip}');

    await request(app).get('/items').set('X-Real-IP', '198.51.100.4');

    expect(await logged).toBe('198.51.100.4');
  });

  it('should use the socket peer for remote and real-ip without proxy headers', async () => {
    const { app, logged } = setup('{remote}|{real-ip}');

    await request(app).get('/items');

    const [remote, realIp] = (await logged).split('|');
    expect(remote).toMatch(/^(\[[0-9a-f:.]+\]|[0-9.]+):\d+$/i);
    expect(realIp).toMatch(/^(::ffff:)?127\.0\.0\.1$|^::1$/);
  });

  it('should skip requests the skipper rejects', async () => {
    const { app, logged, onLog } = setup('{method} {path}', (ctx) => ctx.path === '/health');

    await request(app).get('/health');
    await request(app).get('/items');

    expect(await logged).toBe('GET /items');
    expect(onLog).toHaveBeenCalledTimes(1);
  });

  it('should measure latency from requestTimer', async () => {
    const { app, logged } = setup('{latency-ms}');

    await request(app).get('/slow');

    expect(Number(await logged)).toBeGreaterThanOrEqual(45);
  });

  it('should log requests that end in an error', async () => {
    const { app, logged } = setup('{method} {path} {status}');

    const res = await request(app).get('/boom');

    expect(res.status).toBe(500);
    expect(await logged).toBe('GET /boom 500');
  });

  it('should count the encoded bytes of a gzipped response', async () => {
    const { app, logged } = setup('{method} {path} {status} {size} {size-human} {<Content-Encoding}');

    const res = await request(app).get('/big').set('Accept-Encoding', 'gzip');

    expect(res.headers['content-encoding']).toBe('gzip');
    expect(res.headers['content-length']).toBeUndefined();
    expect(res.text).toBe('x'.repeat(5000));

    const match = /^GET \/big 200 (\d+) (\d+)B gzip$/.exec(await logged);
    expect(match).not.toBeNull();
    const [, size, human] = match ?? [];
    expect(Number(size)).toBeGreaterThan(0);
    expect(Number(size)).toBeLessThan(1024);
    expect(human).toBe(size);
  });

  it('should count a body streamed with res.write', async () => {
    const { app, logged } = setup('{status} {size} {size-human}');

    const res = await request(app).get('/stream').set('Accept-Encoding', 'identity');

    expect(res.text).toBe('abcde');
    expect(res.headers['content-length']).toBeUndefined();
    expect(await logged).toBe('200 5 5B');
  });

  it('should log a request whose JSON body the parser rejects', async () => {
    const { app, logged } = setup('{method} {path} {status}');

    const res = await request(app)
      .post('/items')
      .set('Content-Type', 'application/json')
      .send('{bad');

    expect(res.status).toBe(400);
    expect(await logged).toBe('POST /items 400');
  });

  it('should log a request whose client disconnects before the response', async () => {
    const { app, logged, onLog } = setup('{method} {path} {status} {size}');

    await expect(request(app).get('/hang').timeout(100)).rejects.toThrow();

    expect(await logged).toBe('GET /hang 200 0');
    expect(onLog).toHaveBeenCalledTimes(1);
  });

  it('should percent-decode the path and keep malformed escapes as received', async () => {
    const decoded = setup('{path} {uri}');
    await request(decoded.app).get('/a%20b?q=%20');
    expect(await decoded.logged).toBe('/a b /a%20b?q=%20');

    const malformed = setup('{path}');
    await request(malformed.app).get('/bad%zz');
    expect(await malformed.logged).toBe('/bad%zz');
  });

  it('should report a failing sink through the application logger', async () => {
    const failure = new Error('sink down');
    const service = new AccessLogService({
      format: '{method}',
      onLog: () => {
        throw failure;
      },
    });
    let resolveReported: () => void = () => undefined;
    const reported = new Promise<void>((resolve) => {
      resolveReported = resolve;
    });
    const errorSpy = jest.spyOn(logger, 'error').mockImplementation(() => resolveReported());

    const app = express();
    app.use(accessLogger(service));
    app.get('/items', (_req, res) => {
      res.send('hello');
    });

    try {
      const res = await request(app).get('/items');
      await reported;

      expect(res.status).toBe(200);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith({ err: failure }, 'Access log sink failed');
    } finally {
      errorSpy.mockRestore();
    }
  });
});
