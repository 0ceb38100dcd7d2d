/**
 * Newline-delimited JSON framing: every message is one line of JSON. This is
 * what the orchestrator speaks on stdio.
 */

import type { Readable, Writable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import {
  AbstractMessageReader,
  AbstractMessageWriter,
  Disposable,
  ErrorCodes,
  type DataCallback,
  type Message,
  type MessageWriter,
} from 'vscode-languageserver/node.js';

function isMessage(value: unknown): value is Message {
  return typeof value === 'object' && value !== null && 'jsonrpc' in value && typeof value.jsonrpc === 'string';
}

/**
 * A line that could not be turned into a message. `code` is the JSON-RPC error
 * the peer should get back for it.
 */
export class FramingError extends Error {
  constructor(
    message: string,
    readonly code: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FramingError';
  }
}

export class LineMessageReader extends AbstractMessageReader {
  private buffer = '';
  private closed = false;
  private readonly decoder = new StringDecoder('utf8');

  constructor(private readonly readable: Readable) {
    super();
  }

  override listen(callback: DataCallback): Disposable {
    const onData = (chunk: Buffer | string): void => {
      this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
      this.emitLines(callback);
    };
    const onError = (error: Error): void => this.fireError(error);
    const onEnd = (): void => {
      this.buffer += this.decoder.end();
      this.buffer += '\n';
      this.emitLines(callback);
      this.closeOnce();
    };
    // a destroyed or reset stream emits 'close' without 'end'
    const onClose = (): void => this.closeOnce();

    this.readable.on('data', onData);
    this.readable.on('error', onError);
    this.readable.on('end', onEnd);
    this.readable.on('close', onClose);
    return Disposable.create(() => {
      this.readable.off('data', onData);
      this.readable.off('error', onError);
      this.readable.off('end', onEnd);
      this.readable.off('close', onClose);
    });
  }

  private closeOnce(): void {
    if (this.closed) return;
    this.closed = true;
    this.fireClose();
  }

  private emitLines(callback: DataCallback): void {
    for (let index = this.buffer.indexOf('\n'); index >= 0; index = this.buffer.indexOf('\n')) {
      const line = this.buffer.slice(0, index).trim();
      this.buffer = this.buffer.slice(index + 1);
      if (line === '') continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        this.fireError(new FramingError(`invalid JSON: ${line.slice(0, 80)}`, ErrorCodes.ParseError, { cause: error }));
        continue;
      }
      if (isMessage(parsed)) {
        callback(parsed);
      } else {
        this.fireError(new FramingError(`not a JSON-RPC message: ${line.slice(0, 80)}`, ErrorCodes.InvalidRequest));
      }
    }
  }
}

export class LineMessageWriter extends AbstractMessageWriter implements MessageWriter {
  private errorCount = 0;

  constructor(private readonly writable: Writable) {
    super();
    writable.on('error', (error: Error) => this.fireError(error));
    writable.on('close', () => this.fireClose());
  }

  write(message: Message): Promise<void> {
    return new Promise((resolve, reject) => {
      this.writable.write(`${JSON.stringify(message)}\n`, 'utf-8', error => {
        if (error) {
          this.errorCount += 1;
          this.fireError(error, message, this.errorCount);
          reject(error);
          return;
        }
        this.errorCount = 0;
        resolve();
      });
    });
  }

  end(): void {
    this.writable.end();
  }
}
