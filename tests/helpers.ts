import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';

export function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `filewire-${prefix}-`));
}

export function patternBytes(length: number): Buffer {
  const data = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    data[i] = (i * 31 + 7) % 256;
  }
  return data;
}

/** A readable that delivers `data` in fragments of `fragmentSize` bytes, then ends. */
export function fragmentedStream(data: Buffer, fragmentSize: number): Readable {
  const fragments: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += fragmentSize) {
    fragments.push(data.subarray(offset, offset + fragmentSize));
  }
  return Readable.from(fragments);
}

export function nextEvent<T>(emitter: EventEmitter, event: string): Promise<T> {
  return new Promise<T>((resolve) => {
    emitter.once(event, (payload: T) => resolve(payload));
  });
}

export function collectEvents<T>(emitter: EventEmitter, event: string, count: number): Promise<T[]> {
  return new Promise<T[]>((resolve) => {
    const seen: T[] = [];
    const onEvent = (payload: T): void => {
      seen.push(payload);
      if (seen.length === count) {
        emitter.off(event, onEvent);
        resolve(seen);
      }
    };
    emitter.on(event, onEvent);
  });
}

/** Writes `bytes` on a fresh connection, half-closes, and waits for the peer to close. */
export function sendRaw(port: number, bytes: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const socket = net.createConnection({ host: '127.0.0.1', port }, () => {
      socket.end(bytes);
    });
    socket.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'ECONNRESET' && error.code !== 'EPIPE') {
        reject(error);
      }
    });
    socket.on('close', () => resolve());
    socket.resume();
  });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/** A port that was free a moment ago. */
export function freePort(): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = address && typeof address !== 'string' ? address.port : 0;
      server.close(() => resolve(port));
    });
  });
}
