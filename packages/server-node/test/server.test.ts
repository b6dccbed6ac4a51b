import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  BodyChannel,
  ConfigError,
  Executor,
  NodeServer,
  readText,
  text,
  type Handler,
  type NodeServerOptions,
  type RunningServer,
} from '../src';
import { Client } from './helpers';

describe('NodeServer', () => {
  let running: RunningServer | undefined;
  const clients: Client[] = [];

  async function start(handler: Handler, options: NodeServerOptions = {}): Promise<RunningServer> {
    const server = new NodeServer(handler, { logLevel: 'silent', ...options });
    running = await server.listen({ host: '127.0.0.1', port: 0 });
    return running;
  }

  async function connect(server: RunningServer): Promise<Client> {
    const client = await Client.connect(server.port, server.host);
    clients.push(client);
    return client;
  }

  afterEach(async () => {
    for (const client of clients.splice(0)) client.destroy();
    await running?.stop();
    running = undefined;
  });

  it('answers a request and closes the connection', async () => {
    const server = await start(() => ({ status: 200, body: 'ok' }));
    expect(server.url.href).toBe(`http://127.0.0.1:${server.port}/`);

    const client = await connect(server);
    client.send('GET / HTTP/1.1\r\nHost: localhost\r\n\r\n');
    expect(await client.closed()).toBe(
      'HTTP/1.1 200 OK\r\nconnection: close\r\ncontent-length: 2\r\n\r\nok'
    );
  });

  it('streams a channel response with chunked coding', async () => {
    const server = await start(async (request) => {
      if (request.type === 'error' || !request.body) return undefined;
      const body = await readText(request.body);
      return { status: 200, body: BodyChannel.from([body.toUpperCase()]) };
    });

    const client = await connect(server);
    client.send('POST /echo HTTP/1.1\r\nHost: localhost\r\nContent-Length: 5\r\n\r\nhello');
    expect(await client.closed()).toBe(
      'HTTP/1.1 200 OK\r\nconnection: close\r\ntransfer-encoding: chunked\r\n\r\n' +
        '5\r\nHELLO\r\n0\r\n\r\n'
    );
  });

  it('reads a chunked request body', async () => {
    const server = await start(async (request) => {
      if (request.type === 'error' || !request.body) return undefined;
      return text({ status: 200, body: await readText(request.body) });
    });

    const client = await connect(server);
    client.send('PUT /doc HTTP/1.1\r\nHost: localhost\r\nTransfer-Encoding: chunked\r\n\r\n');
    client.send('3\r\nabc\r\n');
    client.send('2\r\nde\r\n0\r\n\r\n');
    expect(await client.closed()).toBe(
      'HTTP/1.1 200 OK\r\nconnection: close\r\ncontent-length: 5\r\n' +
        'content-type: text/plain; charset=utf-8\r\n\r\nabcde'
    );
  });

  it('sends 100 Continue before reading the body', async () => {
    const server = await start(async (request) => {
      if (request.type === 'error' || !request.body) return undefined;
      request.sendContinue();
      return { status: 201, body: await readText(request.body) };
    });

    const client = await connect(server);
    client.send(
      'POST /upload HTTP/1.1\r\nHost: localhost\r\nExpect: 100-continue\r\nContent-Length: 4\r\n\r\n'
    );
    expect(await client.until('\r\n\r\n')).toBe('HTTP/1.1 100 Continue\r\n\r\n');

    client.send('data');
    expect(await client.closed()).toBe(
      'HTTP/1.1 100 Continue\r\n\r\n' +
        'HTTP/1.1 201 Created\r\nconnection: close\r\ncontent-length: 4\r\n\r\ndata'
    );
  });

  it('stops feeding a full request body until the handler reads it', async () => {
    let body: BodyChannel | undefined;
    let open = (): void => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const server = await start(
      async (request) => {
        if (request.type === 'error' || !request.body) return undefined;
        body = request.body;
        await gate;
        return text({ status: 200, body: await readText(request.body) });
      },
      { inbuf: 1, chunkSize: 1 }
    );
    const payload = 'x'.repeat(50);

    const client = await connect(server);
    client.send('POST /upload HTTP/1.1\r\nHost: localhost\r\nContent-Length: 50\r\n\r\n' + payload);
    await vi.waitFor(() => expect(body?.size).toBe(2));
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(body?.size).toBe(2);
    expect(body?.paused).toBe(true);

    open();
    expect(await client.closed()).toBe(
      'HTTP/1.1 200 OK\r\nconnection: close\r\ncontent-length: 50\r\n' +
        `content-type: text/plain; charset=utf-8\r\n\r\n${payload}`
    );
  });

  it('answers a client that ended its side after the request', async () => {
    const server = await start(
      async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return { status: 200, body: 'ok' };
      },
      { keepAlive: true }
    );

    const client = await connect(server);
    client.end('GET / HTTP/1.1\r\nHost: localhost\r\n\r\n');
    expect(await client.closed()).toBe(
      'HTTP/1.1 200 OK\r\nconnection: close\r\ncontent-length: 2\r\n\r\nok'
    );
  });

  it('drops a request whose body the client cut short', async () => {
    const server = await start(async (request) => {
      if (request.type === 'error' || !request.body) return undefined;
      return text({ status: 200, body: await readText(request.body) });
    });

    const client = await connect(server);
    client.end('POST /upload HTTP/1.1\r\nHost: localhost\r\nContent-Length: 10\r\n\r\nabc');
    expect(await client.closed()).toBe('');
  });

  it('answers a timed-out handler while it still holds the only executor slot', async () => {
    const server = await start(
      (request) => (request.type === 'error' ? { status: 503 } : new Promise<undefined>(() => {})),
      { executor: new Executor(1), handlerTimeout: 50 }
    );

    const client = await connect(server);
    client.send('GET /slow HTTP/1.1\r\nHost: localhost\r\n\r\n');
    expect(await client.closed()).toBe(
      'HTTP/1.1 503 Service Unavailable\r\nconnection: close\r\ncontent-length: 0\r\n\r\n'
    );
  });

  it('answers from the error request when the handler throws', async () => {
    const server = await start((request) => {
      if (request.type === 'error') return { status: 500, body: 'failed' };
      throw new Error('boom');
    });

    const client = await connect(server);
    client.send('GET /broken HTTP/1.1\r\nHost: localhost\r\n\r\n');
    expect(await client.closed()).toBe(
      'HTTP/1.1 500 Internal Server Error\r\nconnection: close\r\ncontent-length: 6\r\n\r\nfailed'
    );
  });

  it('closes the connection on a malformed request', async () => {
    const server = await start(() => ({ status: 200 }));

    const client = await connect(server);
    client.send('NOT HTTP\r\n\r\n');
    expect(await client.closed()).toBe('');
  });

  it('keeps the connection for further requests when enabled', async () => {
    const server = await start(
      (request) =>
        request.type === 'error' ? undefined : { status: 200, body: request.url.pathname },
      { keepAlive: true }
    );

    const client = await connect(server);
    client.send('GET /one HTTP/1.1\r\nHost: localhost\r\n\r\n');
    expect(await client.until('/one')).toBe(
      'HTTP/1.1 200 OK\r\ncontent-length: 4\r\n\r\n/one'
    );

    client.send('GET /two HTTP/1.1\r\nHost: localhost\r\nConnection: close\r\n\r\n');
    expect(await client.closed()).toBe(
      'HTTP/1.1 200 OK\r\ncontent-length: 4\r\n\r\n/one' +
        'HTTP/1.1 200 OK\r\nconnection: close\r\ncontent-length: 4\r\n\r\n/two'
    );
  });

  it('rejects invalid options before listening', () => {
    const options: NodeServerOptions = JSON.parse('{"port": -1, "aggregateLength": 10}');
    expect(() => new NodeServer(() => undefined, options)).toThrow(ConfigError);
  });

  it('fails to listen on a port in use', async () => {
    const server = await start(() => undefined);
    const second = new NodeServer(() => undefined, { logLevel: 'silent' });
    await expect(second.listen({ host: '127.0.0.1', port: server.port })).rejects.toThrow(
      /EADDRINUSE/
    );
  });
});
