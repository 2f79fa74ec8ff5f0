import http, { type Server } from 'http';
import type { AddressInfo } from 'net';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp, type AppOptions } from '../app';
import type { FetchLike } from '../sheets/assetFetcher';
import { sampleCatalog, sampleManifest, solidPng, stubFetch } from './fixtures';

async function listen(options: AppOptions): Promise<{ server: Server; port: number }> {
  const app = createApp(options);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  return { server, port: address.port };
}

function close(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('HTTP service', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const started = await listen({
      catalog: sampleCatalog(),
      manifestPath: '/proxy-sheets-test/manifest.yaml',
      fetchImpl: stubFetch(await solidPng()),
    });
    server = started.server;
    baseUrl = `http://127.0.0.1:${started.port}`;
  });

  afterAll(() => close(server));

  function postSheets(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api/sheets`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('answers the health check', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('OK');
  });

  it('serves the primary manifest', async () => {
    const res = await fetch(`${baseUrl}/api/manifest`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(sampleManifest());
  });

  it('returns 404 when no overlay is loaded', async () => {
    const res = await fetch(`${baseUrl}/api/manifest/local`);
    expect(res.status).toBe(404);
  });

  it('rejects an unknown printing with its id', async () => {
    const res = await postSheets({ printings: ['99999'] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'unknown printing 99999', ids: ['99999'] });
  });

  it('rejects an unusable layout', async () => {
    const res = await postSheets({ printings: ['01001'], profile: { rows: 0 } });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ids: ['rows'] });
  });

  it('rejects a malformed body', async () => {
    const res = await postSheets({ cards: ['01001'] });
    expect(res.status).toBe(400);
  });

  it('returns a PDF for a valid request', async () => {
    const res = await postSheets({ deckList: '26066.1\n', profile: { rows: 1, columns: 1, cut: 'lines' } });
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/pdf');
    const body = Buffer.from(await res.arrayBuffer());
    expect(body.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});

describe('HTTP service: client disconnect', () => {
  it('aborts in-flight image fetches when the client goes away', async () => {
    let fetchStarted: (url: string) => void = () => undefined;
    const started = new Promise<string>((resolve) => {
      fetchStarted = resolve;
    });
    let fetchAborted: () => void = () => undefined;
    const aborted = new Promise<void>((resolve) => {
      fetchAborted = resolve;
    });
    const fetchImpl: FetchLike = (url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal.addEventListener(
          'abort',
          () => {
            fetchAborted();
            reject(new Error('aborted'));
          },
          { once: true }
        );
        fetchStarted(url);
      });

    const { server, port } = await listen({
      catalog: sampleCatalog(),
      manifestPath: '/proxy-sheets-test/manifest.yaml',
      fetchImpl,
    });
    try {
      const req = http.request({
        host: '127.0.0.1',
        port,
        path: '/api/sheets',
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
      });
      // the reset from destroying the socket is expected here
      req.on('error', () => undefined);
      req.end(JSON.stringify({ printings: ['20037'] }));

      expect(await started).toBe('https://img.test/cards/english/card/20037.webp');
      req.destroy();
      await aborted;
    } finally {
      await close(server);
    }
  });
});
