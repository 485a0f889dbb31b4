import { afterEach, describe, expect, it, vi } from 'vitest';
import { EOF, UnexpectedEndOfStreamError } from '@objstream/transport';
import {
  connectInMemory,
  readObject,
  writeObject,
  type StoragePluginServer,
} from '../src/index.js';

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('connectInMemory', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers a handler failure to the host as a carried error', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('backend unavailable');
    const plugin: StoragePluginServer = {
      async getObject() {
        throw failure;
      },
      async putObject() {
        throw failure;
      },
    };
    const client = connectInMemory(plugin);

    await expect(
      readObject(client.getObject({ bucket: 'recordings', key: 'k' })),
    ).rejects.toBe(failure);
    await expect(
      writeObject(client.putObject(), 'recordings', 'k', [Buffer.from('x')]),
    ).rejects.toBe(failure);
    await tick();

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[InMemoryStoragePlugin\] Handler for getObject .+ failed:$/),
      failure,
    );
    expect(client.activeStreams).toBe(0);
  });

  it('settles the call when the source fails after the handler already failed', async () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('backend unavailable');
    const diskError = new Error('disk');
    const plugin: StoragePluginServer = {
      async getObject() {},
      async putObject() {
        throw failure;
      },
    };
    const client = connectInMemory(plugin);
    async function* source(): AsyncGenerator<Uint8Array> {
      await new Promise((resolve) => setTimeout(resolve, 20));
      throw diskError;
    }

    await expect(
      writeObject(client.putObject(), 'recordings', 'k', source()),
    ).rejects.toBe(diskError);
    await tick();

    expect(client.activeStreams).toBe(0);
    expect(debugSpy).toHaveBeenCalledWith(
      '[writeObject] Plugin ended upload of recordings/k first:',
      failure,
    );
  });

  it('wraps a thrown non-error value', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const plugin: StoragePluginServer = {
      getObject() {
        return Promise.reject('quota exceeded');
      },
      async putObject() {},
    };
    const client = connectInMemory(plugin);

    await expect(
      readObject(client.getObject({ bucket: 'recordings', key: 'k' })),
    ).rejects.toThrow('quota exceeded');
  });

  it('ends a download the handler left open', async () => {
    const plugin: StoragePluginServer = {
      async getObject(_req, stream) {
        await stream.send({ fileChunk: Buffer.from('only') });
      },
      async putObject() {},
    };
    const client = connectInMemory(plugin);

    const data = await readObject(client.getObject({ bucket: 'recordings', key: 'k' }));

    expect(Buffer.from(data).toString()).toBe('only');
  });

  it('reports an upload the handler never completed as unexpected termination', async () => {
    const received: string[] = [];
    const plugin: StoragePluginServer = {
      async getObject() {},
      async putObject(stream) {
        while (true) {
          const req = await stream.recv();
          if (req === EOF) return;
          received.push(Buffer.from(req.fileChunk).toString());
        }
      },
    };
    const client = connectInMemory(plugin);

    await expect(
      writeObject(client.putObject(), 'recordings', 'k', [Buffer.from('x')]),
    ).rejects.toBeInstanceOf(UnexpectedEndOfStreamError);
    expect(received).toEqual(['x']);
  });

  it('tracks each call until both of its halves close', async () => {
    let release: () => void = () => {};
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    const plugin: StoragePluginServer = {
      async getObject(_req, stream) {
        await blocked;
        await stream.close();
      },
      async putObject() {},
    };
    const client = connectInMemory(plugin);

    const download = client.getObject({ bucket: 'recordings', key: 'k' });
    await tick();
    expect(client.activeStreams).toBe(1);

    release();
    await expect(download.recv()).resolves.toBe(EOF);
    await tick();
    expect(client.activeStreams).toBe(0);
  });
});
