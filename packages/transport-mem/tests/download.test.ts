import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  EOF,
  InvalidArgumentError,
  StreamClosedError,
  errorMessage,
  payloadMessage,
  type DownloadClient,
} from '@objstream/transport';
import { createDownloadStream } from '../src/index.js';
import { tick, track } from './helpers.js';

async function drain<T>(client: DownloadClient<T>): Promise<T[]> {
  const received: T[] = [];
  while (true) {
    const msg = await client.recv();
    if (msg === EOF) return received;
    received.push(msg);
  }
}

describe('MemoryDownloadStream', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers every chunk in order, then EOF', async () => {
    const stream = createDownloadStream<string>();
    const producing = (async () => {
      for (const chunk of ['a', 'b', 'c']) {
        await stream.server.send(chunk);
      }
      await stream.server.close();
    })();

    const received = await drain(stream.client);
    await producing;

    expect(received).toEqual(['a', 'b', 'c']);
    expect(stream.isClosed).toBe(true);
    await expect(stream.client.recv()).resolves.toBe(EOF);
  });

  it('delivers a carried error after the chunks sent before it, then EOF', async () => {
    const stream = createDownloadStream<string>();
    const failure = new Error('backend rejected the read');
    const producing = (async () => {
      await stream.server.send('a');
      await stream.server.sendError(failure);
    })();

    await expect(stream.client.recv()).resolves.toBe('a');
    await expect(stream.client.recv()).rejects.toBe(failure);
    expect(stream.isClosed).toBe(true);

    await expect(stream.client.recv()).resolves.toBe(EOF);
    await expect(stream.client.recv()).resolves.toBe(EOF);
    await producing;
  });

  it('blocks a send until the client receives it', async () => {
    const stream = createDownloadStream<string>();
    const sending = stream.server.send('a');
    const sent = track(sending);

    await tick();
    expect(sent.settled).toBe(false);

    await expect(stream.client.recv()).resolves.toBe('a');
    await sending;
  });

  it('rejects a missing payload without changing the stream', async () => {
    const stream = createDownloadStream<string | undefined>();

    await expect(stream.server.send(undefined)).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    expect(stream.isClosed).toBe(false);

    const receiving = stream.client.recv();
    await stream.server.send('a');
    await expect(receiving).resolves.toBe('a');
  });

  it('rejects every send on a closed stream without blocking', async () => {
    const stream = createDownloadStream<string>();
    await stream.server.close();

    await expect(stream.server.send('a')).rejects.toBeInstanceOf(StreamClosedError);
    await expect(stream.server.sendError(new Error('late'))).rejects.toBeInstanceOf(
      StreamClosedError,
    );
    await expect(stream.server.sendMsg(payloadMessage('a'))).rejects.toBeInstanceOf(
      StreamClosedError,
    );
    await expect(stream.client.closeSend()).rejects.toThrow('stream is closed');
  });

  it('lets the client abandon the download while the server is sending', async () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const stream = createDownloadStream<string>();
    const sending = expect(stream.server.send('a')).rejects.toBeInstanceOf(
      StreamClosedError,
    );

    await stream.client.closeSend();

    await sending;
    expect(stream.isClosed).toBe(true);
    expect(debugSpy).toHaveBeenCalledWith(
      `[DownloadStream ${stream.id}] Closed with 1 undelivered message(s).`,
    );
  });

  it('wakes a waiting client with EOF when the server closes', async () => {
    const stream = createDownloadStream<string>();
    const receiving = stream.client.recv();

    await stream.server.close();

    await expect(receiving).resolves.toBe(EOF);
  });

  it('closes the stream after an error even when the client closed first', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    const stream = createDownloadStream<string>();
    const sending = expect(
      stream.server.sendError(new Error('backend failure')),
    ).rejects.toBeInstanceOf(StreamClosedError);

    await stream.client.closeSend();

    await sending;
    expect(stream.isClosed).toBe(true);
  });

  it('closes exactly once when both ends close concurrently', async () => {
    const stream = createDownloadStream<string>();
    const onClose = vi.fn();
    stream.onClose(onClose);

    await Promise.all([
      ...Array.from({ length: 10 }, () => stream.server.close()),
      ...Array.from({ length: 10 }, async () => {
        await tick();
        stream.close();
      }),
    ]);
    await tick();

    expect(stream.isClosed).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('routes raw messages through the typed paths', async () => {
    const stream = createDownloadStream<string>();
    const failure = new Error('carried');

    const sendingPayload = stream.server.sendMsg(payloadMessage('a'));
    await expect(stream.client.recvMsg()).resolves.toBe('a');
    await sendingPayload;
    expect(stream.isClosed).toBe(false);

    const sendingError = stream.server.sendMsg(errorMessage(failure));
    await expect(stream.client.recvMsg()).rejects.toBe(failure);
    expect(stream.isClosed).toBe(true);
    await sendingError;
  });

  it('rejects a raw payload message without a payload', async () => {
    const stream = createDownloadStream<string | undefined>();

    await expect(stream.server.sendMsg(payloadMessage(undefined))).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    expect(stream.isClosed).toBe(false);
  });

  it('answers metadata and scope queries with fixed values', async () => {
    const stream = createDownloadStream<string>();

    expect((await stream.client.header()).size).toBe(0);
    expect(stream.client.trailer().size).toBe(0);
    expect(stream.client.context().signal.aborted).toBe(false);
    await expect(stream.client.sendMsg()).resolves.toBeUndefined();
    expect(stream.server.context().deadline).toBeUndefined();
    await expect(stream.server.setHeader(new Map([['k', ['v']]]))).resolves.toBeUndefined();
    await expect(stream.server.sendHeader(new Map())).resolves.toBeUndefined();
    expect(() => stream.server.setTrailer(new Map())).not.toThrow();
    await expect(stream.server.recvMsg()).resolves.toBeUndefined();
    expect(stream.isClosed).toBe(false);
  });
});
