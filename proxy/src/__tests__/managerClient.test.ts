import http, { type Server } from 'node:http';
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import express from 'express';
import { UpstreamError } from '@raygate/shared';
import { createManagerLookup } from '../managerClient.js';
import { close, closedPort, listen } from './helpers.js';

const seen: Array<{ name: string; namespace: unknown }> = [];
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  // In-process stand-in for the manager API
  const stub = express();
  stub.get('/clusters/:name', (req, res) => {
    const { name } = req.params;
    seen.push({ name, namespace: req.query.namespace });

    if (name === 'demo') {
      res.json({ name, host: 'demo-ray-head', ip: '10.96.14.2', port: '8265' });
    } else if (name === 'broken') {
      res.status(500).json({ success: false, error: 'Unable to connect to the server' });
    } else if (name === 'weird') {
      res.json({ name });
    } else {
      res.status(404).json({ success: false, error: `Cluster ${name} not found` });
    }
  });

  server = http.createServer(stub);
  const port = await listen(server);
  baseUrl = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
  await close(server);
});

beforeEach(() => {
  seen.length = 0;
});

describe('createManagerLookup', () => {
  it('returns cluster details from the manager', async () => {
    const lookup = createManagerLookup({ baseUrl, timeoutMs: 2000 });

    await expect(lookup('demo')).resolves.toEqual({
      name: 'demo',
      host: 'demo-ray-head',
      ip: '10.96.14.2',
      port: '8265',
    });
    expect(seen).toEqual([{ name: 'demo', namespace: undefined }]);
  });

  it('passes the configured namespace', async () => {
    const lookup = createManagerLookup({ baseUrl, timeoutMs: 2000, namespace: 'team-a' });

    await lookup('demo');

    expect(seen).toEqual([{ name: 'demo', namespace: 'team-a' }]);
  });

  it('returns null for an unknown cluster', async () => {
    const lookup = createManagerLookup({ baseUrl, timeoutMs: 2000 });

    await expect(lookup('ghost')).resolves.toBeNull();
  });

  it('reports manager errors as UpstreamError', async () => {
    const lookup = createManagerLookup({ baseUrl, timeoutMs: 2000 });

    const err = await lookup('broken').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ message: 'Manager lookup for cluster broken failed: status 500', statusCode: 502 });
  });

  it('rejects responses missing head service fields', async () => {
    const lookup = createManagerLookup({ baseUrl, timeoutMs: 2000 });

    await expect(lookup('weird')).rejects.toThrow('Manager returned malformed details for cluster weird');
  });

  it('reports an unreachable manager', async () => {
    const port = await closedPort();
    const lookup = createManagerLookup({ baseUrl: `http://127.0.0.1:${port}`, timeoutMs: 2000 });

    await expect(lookup('demo')).rejects.toThrow('Manager lookup for cluster demo failed: ECONNREFUSED');
  });
});
