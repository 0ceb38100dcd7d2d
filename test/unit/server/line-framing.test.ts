import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';

import type { Message } from 'vscode-languageserver/node.js';

import { FramingError, LineMessageReader, LineMessageWriter } from '../../../src/server/line-framing.js';

const tick = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

function collect(reader: LineMessageReader): { messages: string[]; errors: string[] } {
  const messages: string[] = [];
  const errors: string[] = [];
  reader.listen((message: Message) => messages.push(JSON.stringify(message)));
  reader.onError(error => errors.push(error.message));
  return { messages, errors };
}

describe('LineMessageReader', () => {
  it('emits one message per line across chunk boundaries', async () => {
    const input = new PassThrough();
    const { messages } = collect(new LineMessageReader(input));

    input.write('{"jsonrpc":"2.0","method":"a"}\n{"jsonrpc":"2.0",');
    input.write('"method":"b"}\n');
    await tick();

    assert.deepEqual(messages, ['{"jsonrpc":"2.0","method":"a"}', '{"jsonrpc":"2.0","method":"b"}']);
  });

  it('decodes characters split between chunks', async () => {
    const input = new PassThrough();
    const { messages } = collect(new LineMessageReader(input));
    const bytes = Buffer.from('{"jsonrpc":"2.0","method":"café"}\n', 'utf-8');
    const split = bytes.indexOf(0xa9);

    input.write(bytes.subarray(0, split));
    input.write(bytes.subarray(split));
    await tick();

    assert.deepEqual(messages, ['{"jsonrpc":"2.0","method":"café"}']);
  });

  it('skips blank lines and reports lines that are not messages', async () => {
    const input = new PassThrough();
    const { messages, errors } = collect(new LineMessageReader(input));

    input.write('\n  \n{"id":1}\n{"jsonrpc":"2.0","method":"ok"}\n');
    await tick();

    assert.deepEqual(messages, ['{"jsonrpc":"2.0","method":"ok"}']);
    assert.deepEqual(errors, ['not a JSON-RPC message: {"id":1}']);
  });

  it('keeps reading after malformed JSON', async () => {
    const input = new PassThrough();
    const { messages, errors } = collect(new LineMessageReader(input));

    input.write('{not json\n{"jsonrpc":"2.0","method":"next"}\n');
    await tick();

    assert.deepEqual(errors, ['invalid JSON: {not json']);
    assert.deepEqual(messages, ['{"jsonrpc":"2.0","method":"next"}']);
  });

  it('tags unreadable lines with their JSON-RPC error code', async () => {
    const input = new PassThrough();
    const reader = new LineMessageReader(input);
    const codes: number[] = [];
    reader.listen(() => undefined);
    reader.onError(error => {
      assert.ok(error instanceof FramingError);
      codes.push(error.code);
    });

    input.write('{not json\n[1,2]\n');
    await tick();

    assert.deepEqual(codes, [-32700, -32600]);
  });

  it('closes once when the stream is destroyed without ending', async () => {
    const input = new PassThrough();
    const reader = new LineMessageReader(input);
    const { errors } = collect(reader);
    let closes = 0;
    reader.onClose(() => {
      closes += 1;
    });

    input.destroy(new Error('connection reset'));
    await tick();
    await tick();

    assert.deepEqual(errors, ['connection reset']);
    assert.equal(closes, 1);
  });

  it('closes once when the stream ends normally', async () => {
    const input = new PassThrough();
    const reader = new LineMessageReader(input);
    collect(reader);
    let closes = 0;
    reader.onClose(() => {
      closes += 1;
    });

    input.end();
    input.resume();
    await tick();
    await tick();

    assert.equal(closes, 1);
  });

  it('flushes a final line without a newline and closes', async () => {
    const input = new PassThrough();
    const reader = new LineMessageReader(input);
    const { messages } = collect(reader);
    let closed = false;
    reader.onClose(() => {
      closed = true;
    });

    input.end('{"jsonrpc":"2.0","method":"last"}');
    await tick();

    assert.deepEqual(messages, ['{"jsonrpc":"2.0","method":"last"}']);
    assert.equal(closed, true);
  });
});

describe('LineMessageWriter', () => {
  it('writes each message as one line of JSON', async () => {
    const output = new PassThrough();
    const writer = new LineMessageWriter(output);
    const first = { jsonrpc: '2.0', method: 'x', params: { a: 1 } };
    const second = { jsonrpc: '2.0', id: 1, result: null };

    await writer.write(first);
    await writer.write(second);

    assert.equal(
      String(output.read()),
      '{"jsonrpc":"2.0","method":"x","params":{"a":1}}\n{"jsonrpc":"2.0","id":1,"result":null}\n'
    );
  });
});
