import type { Buffer } from 'node:buffer';
import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import { afterEach, describe, it, expect } from 'vitest';
import { connect } from './connect.js';
import { createRequest } from '../request/builder.js';
import { parseUrl } from '../url/parse-url.js';
import { OK_HELLO_RESPONSE, PROXY_ESTABLISHED, PROXY_FORBIDDEN, rawHead } from '../test/fixtures.js';

const HEAD_END = '\r\n\r\n';

interface LoopbackServer {
  readonly port: number;
  readonly heads: string[];
}

const servers: Server[] = [];
const sockets = new Set<Socket>();

const listen = async (server: Server): Promise<number> => {
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  return typeof address === 'object' && address !== null ? address.port : 0;
};

const track = (socket: Socket): void => {
  sockets.add(socket);
  socket.on('close', () => sockets.delete(socket));
  socket.on('error', () => sockets.delete(socket));
};

/**
 * Loopback server that reacts to the first bytes of each connection.
 */
const startRawServer = (onData: (socket: Socket) => void): Promise<number> =>
  listen(
    createServer((socket) => {
      track(socket);
      socket.once('data', () => onData(socket));
    })
  );

/**
 * Loopback server that hands each complete request head to a handler.
 */
const startServer = async (
  onHead: (socket: Socket, head: string, index: number) => void
): Promise<LoopbackServer> => {
  const heads: string[] = [];
  const server = createServer((socket) => {
    track(socket);

    let buffered = '';
    let count = 0;
    socket.on('data', (chunk: Buffer) => {
      buffered += chunk.toString('latin1');
      let end = buffered.indexOf(HEAD_END);
      while (end !== -1) {
        const head = buffered.slice(0, end);
        buffered = buffered.slice(end + HEAD_END.length);
        heads.push(head);
        onHead(socket, head, count);
        count += 1;
        end = buffered.indexOf(HEAD_END);
      }
    });
  });
  return { port: await listen(server), heads };
};

/**
 * Finds a loopback port with nothing listening on it.
 */
const closedPort = async (): Promise<number> => {
  const server = createServer();
  const port = await listen(server);
  servers.splice(servers.indexOf(server), 1);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
};

afterEach(async () => {
  for (const socket of sockets) {
    socket.destroy();
  }
  sockets.clear();
  await Promise.all(
    servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve())))
  );
});

describe('connect', () => {
  describe('given a plain HTTP server', () => {
    it('completes a request when the server keeps the connection open', async () => {
      const server = await startServer((socket) => socket.write(OK_HELLO_RESPONSE));

      const result = await createRequest(`http://127.0.0.1:${String(server.port)}/hello?x=1`)
        ._unsafeUnwrap()
        .send();

      const response = result._unsafeUnwrap();
      expect(response.status).toBe(200);
      expect(response.text()._unsafeUnwrap()).toBe('hello');
      expect(server.heads[0]?.split('\r\n')[0]).toBe('GET /hello?x=1 HTTP/1.1');
    });

    it('reads a close-delimited body', async () => {
      const server = await startServer((socket) => {
        socket.end(rawHead('HTTP/1.0 200 OK') + 'streamed until close');
      });

      const result = await createRequest(`http://127.0.0.1:${String(server.port)}/`)._unsafeUnwrap().send();

      expect(result._unsafeUnwrap().text()._unsafeUnwrap()).toBe('streamed until close');
    });

    it('times out when the server never answers', async () => {
      const server = await startServer(() => undefined);

      const result = await createRequest(`http://127.0.0.1:${String(server.port)}/`)
        ._unsafeUnwrap()
        .timeout(100)
        .send();

      expect(result._unsafeUnwrapErr().code).toBe('TIMEOUT');
    });
  });

  describe('given nothing listening', () => {
    it('returns CONNECTION_REFUSED', async () => {
      const port = await closedPort();

      const result = await connect(parseUrl(`http://127.0.0.1:${String(port)}/`)._unsafeUnwrap());

      expect(result._unsafeUnwrapErr().code).toBe('CONNECTION_REFUSED');
    });
  });

  describe('given an https URL served by a plain TCP server', () => {
    it('returns TLS_HANDSHAKE_FAILED', async () => {
      const port = await startRawServer((socket) => socket.end('not tls\r\n'));

      const target = parseUrl(`https://127.0.0.1:${String(port)}/`)._unsafeUnwrap();
      const result = await connect(target, { timeoutMs: 2000 });

      expect(result._unsafeUnwrapErr().code).toBe('TLS_HANDSHAKE_FAILED');
    });
  });

  describe('given a CONNECT proxy', () => {
    it('tunnels the request to the target', async () => {
      const proxy = await startServer((socket, _head, index) => {
        socket.write(index === 0 ? PROXY_ESTABLISHED : OK_HELLO_RESPONSE);
      });

      const result = await createRequest('http://api.example.com/items')
        ._unsafeUnwrap()
        .proxy(`http://127.0.0.1:${String(proxy.port)}`)
        ._unsafeUnwrap()
        .send();

      expect(result._unsafeUnwrap().text()._unsafeUnwrap()).toBe('hello');
      expect(proxy.heads[0]).toBe('CONNECT api.example.com:80 HTTP/1.1\r\nHost: api.example.com:80');
      expect(proxy.heads[1]?.split('\r\n').slice(0, 2)).toEqual([
        'GET /items HTTP/1.1',
        'Host: api.example.com',
      ]);
    });

    it('replays response bytes the proxy sent with its CONNECT answer', async () => {
      const proxy = await startServer((socket, _head, index) => {
        if (index === 0) {
          socket.write(PROXY_ESTABLISHED + OK_HELLO_RESPONSE);
        }
      });

      const result = await createRequest('http://api.example.com/')
        ._unsafeUnwrap()
        .proxy(`http://127.0.0.1:${String(proxy.port)}`)
        ._unsafeUnwrap()
        .send();

      expect(result._unsafeUnwrap().text()._unsafeUnwrap()).toBe('hello');
    });

    it('reports the 2xx status line when the proxy sends data before the TLS handshake', async () => {
      const proxy = await startServer((socket, _head, index) => {
        if (index === 0) {
          socket.write(`${PROXY_ESTABLISHED}unexpected`);
        }
      });

      const result = await connect(parseUrl('https://api.example.com/')._unsafeUnwrap(), {
        proxy: parseUrl(`http://127.0.0.1:${String(proxy.port)}`)._unsafeUnwrap(),
      });

      const error = result._unsafeUnwrapErr();
      expect(error.code).toBe('PROXY_CONNECT_FAILED');
      expect(error.message).toBe('Proxy sent data before the TLS handshake');
      if (error.code === 'PROXY_CONNECT_FAILED') {
        expect(error.statusLine).toBe('HTTP/1.1 200 Connection Established');
      }
    });

    it('returns PROXY_CONNECT_FAILED when the proxy refuses', async () => {
      const proxy = await startServer((socket) => socket.end(PROXY_FORBIDDEN));

      const result = await connect(parseUrl('https://api.example.com/')._unsafeUnwrap(), {
        proxy: parseUrl(`http://127.0.0.1:${String(proxy.port)}`)._unsafeUnwrap(),
      });

      const error = result._unsafeUnwrapErr();
      expect(error.code).toBe('PROXY_CONNECT_FAILED');
      if (error.code === 'PROXY_CONNECT_FAILED') {
        expect(error.statusLine).toBe('HTTP/1.1 403 Forbidden');
      }
    });
  });
});
