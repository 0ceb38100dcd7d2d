import { createServer, type Server as NetServer, type Socket } from 'node:net';
import type { Readable, Writable } from 'node:stream';
import {
  StreamMessageReader,
  StreamMessageWriter,
  type MessageReader,
  type MessageWriter,
} from 'vscode-languageserver/node.js';

import { createLogger } from '../utils/logger.js';
import { LineMessageReader, LineMessageWriter } from './line-framing.js';
import type { Server } from './server.js';

/** `newline`: one JSON message per line. `headers`: LSP-style `Content-Length` frames. */
export type Framing = 'newline' | 'headers';

export const FRAMINGS: readonly Framing[] = ['newline', 'headers'];

export function isFraming(value: string): value is Framing {
  return value === 'newline' || value === 'headers';
}

export interface Transport {
  readonly reader: MessageReader;
  readonly writer: MessageWriter;
}

export function createTransport(input: Readable, output: Writable, framing: Framing): Transport {
  return framing === 'headers'
    ? { reader: new StreamMessageReader(input), writer: new StreamMessageWriter(output) }
    : { reader: new LineMessageReader(input), writer: new LineMessageWriter(output) };
}

/** Serves a single connection over stdin/stdout until stdin closes. */
export async function runStdio(server: Server, framing: Framing = 'newline'): Promise<void> {
  const logger = createLogger('transport:stdio');
  logger.info('serving on stdio', { framing });
  const { reader, writer } = createTransport(process.stdin, process.stdout, framing);
  await server.serve(reader, writer);
}

export interface ListenOptions {
  readonly host?: string;
  readonly framing?: Framing;
}

/**
 * Accepts TCP connections on `port`. Every socket gets its own dispatcher and
 * therefore its own initialization state. Resolves once the socket is bound.
 */
export function listen(server: Server, port: number, options: ListenOptions = {}): Promise<NetServer> {
  const { host = '127.0.0.1', framing = 'newline' } = options;
  const logger = createLogger('transport:tcp');

  const netServer = createServer((socket: Socket) => {
    const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    logger.debug('client connected', { peer });
    socket.on('error', error => logger.warn('socket error', { peer, error: error.message }));
    const { reader, writer } = createTransport(socket, socket, framing);
    server
      .serve(reader, writer)
      .then(() => logger.debug('client disconnected', { peer }))
      .catch((error: unknown) => logger.error('connection failed', error, { peer }));
  });

  return new Promise((resolve, reject) => {
    netServer.once('error', reject);
    netServer.listen(port, host, () => {
      netServer.off('error', reject);
      const address = netServer.address();
      logger.info('listening', {
        address: typeof address === 'object' && address !== null ? `${address.address}:${address.port}` : address,
        framing,
      });
      resolve(netServer);
    });
  });
}
