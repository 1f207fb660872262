import { EventEmitter, once } from 'events';
import * as fs from 'fs/promises';
import * as net from 'net';
import * as path from 'path';
import { performance } from 'perf_hooks';
import type { Writable } from 'stream';
import { encodeHeader } from '../protocol/framing';
import type { SecureChannel } from '../network/secureChannel';
import { logger } from '../utils/logger';
import { TransferError, errorCode } from '../utils/errors';
import { ensureChunkSize, ensurePort } from '../utils/validation';
import type { TransferResult } from '../../shared/types/transfer';

export interface SenderOptions {
  chunkSize: number;
  /** Client-role channel; when present every connection is upgraded to TLS. */
  secureChannel?: SecureChannel | null;
  /** How long to wait for the peer to close after the last byte is handed over. */
  lingerMs?: number;
}

const DEFAULT_LINGER_MS = 5000;

/**
 * Sends one file per connection: header, then the payload in chunks of at
 * most `chunkSize` bytes. Completion means every byte has been handed to the
 * transport; the receiver does not acknowledge.
 */
export class FileSender extends EventEmitter {
  private readonly chunkSize: number;
  private readonly secureChannel: SecureChannel | null;
  private readonly lingerMs: number;

  constructor(options: SenderOptions) {
    super();
    this.chunkSize = ensureChunkSize(options.chunkSize);
    this.secureChannel = options.secureChannel ?? null;
    this.lingerMs = options.lingerMs ?? DEFAULT_LINGER_MS;

    if (this.secureChannel && this.secureChannel.role !== 'client') {
      throw new Error('FileSender requires a client-role SecureChannel');
    }
  }

  get secure(): boolean {
    return this.secureChannel !== null;
  }

  async send(host: string, port: number, filePath: string, attempt = 1): Promise<TransferResult> {
    ensurePort(port);
    const start = performance.now();

    const fileSize = await this.statFile(filePath);
    const filename = path.basename(filePath);
    const header = encodeHeader(filename, fileSize);

    const fileHandle = await this.openFile(filePath);
    let raw: net.Socket | null = null;
    let channel: net.Socket | null = null;

    try {
      raw = await this.connect(host, port);
      channel = this.secureChannel ? await this.secureChannel.upgrade(raw, host) : raw;
      channel.on('error', (error) => {
        logger.debug(`Socket error from ${host}:${port}: ${error.message}`);
      });

      logger.info(`Sending '${filename}' (${fileSize} bytes) to ${host}:${port}`, {
        secure: this.secure,
        attempt,
      });

      await this.write(channel, header);
      const bytesSent = await this.streamPayload(fileHandle, channel, fileSize, filePath);

      channel.end();
      await once(channel, 'finish');
      const durationSeconds = (performance.now() - start) / 1000;

      const result: TransferResult = {
        filename,
        fileSizeBytes: fileSize,
        bytesSent,
        durationSeconds,
        secure: this.secure,
        attempt,
      };
      this.emit('transfer-sent', result);

      await this.linger(channel);
      return result;
    } catch (error) {
      throw TransferError.from(error, 'IOFailure');
    } finally {
      channel?.destroy();
      raw?.destroy();
      await fileHandle.close();
    }
  }

  /**
   * Sends the same file `repeat` times over independent connections. The
   * first failure aborts the run; no partial results are returned.
   */
  async sendRepeated(
    host: string,
    port: number,
    filePath: string,
    repeat: number
  ): Promise<TransferResult[]> {
    const results: TransferResult[] = [];

    for (let attempt = 1; attempt <= repeat; attempt++) {
      logger.info(`=== Send ${attempt}/${repeat} ===`);
      try {
        const result = await this.send(host, port, filePath, attempt);
        logger.info(`Client-measured time: ${result.durationSeconds.toFixed(6)} s`);
        results.push(result);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Send ${attempt} failed: ${message}`);
        throw error;
      }
    }

    return results;
  }

  private async statFile(filePath: string): Promise<bigint> {
    try {
      const stats = await fs.stat(filePath, { bigint: true });
      if (!stats.isFile()) {
        throw TransferError.fileNotFound(filePath);
      }
      return stats.size;
    } catch (error) {
      if (error instanceof TransferError) {
        throw error;
      }
      throw TransferError.fileNotFound(filePath, error);
    }
  }

  private async openFile(filePath: string): Promise<fs.FileHandle> {
    try {
      return await fs.open(filePath, 'r');
    } catch (error) {
      throw errorCode(error) === 'ENOENT'
        ? TransferError.fileNotFound(filePath, error)
        : TransferError.io(`Unable to open ${filePath}`, error);
    }
  }

  private connect(host: string, port: number): Promise<net.Socket> {
    return new Promise<net.Socket>((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onError = (error: Error): void => {
        socket.destroy();
        reject(TransferError.io(`Unable to connect to ${host}:${port}: ${error.message}`, error));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        socket.on('error', (error) => {
          logger.debug(`Raw socket error from ${host}:${port}: ${error.message}`);
        });
        logger.debug(`Connected to ${host}:${port}`);
        resolve(socket);
      });
    });
  }

  private async streamPayload(
    fileHandle: fs.FileHandle,
    socket: Writable,
    fileSize: bigint,
    filePath: string
  ): Promise<bigint> {
    let sent = 0n;

    while (sent < fileSize) {
      const remaining = fileSize - sent;
      const length = remaining < BigInt(this.chunkSize) ? Number(remaining) : this.chunkSize;
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await fileHandle.read(buffer, 0, length, Number(sent));

      if (bytesRead === 0) {
        throw TransferError.io(`${filePath} ended after ${sent} of ${fileSize} bytes`);
      }

      await this.write(socket, buffer.subarray(0, bytesRead));
      sent += BigInt(bytesRead);
    }

    return sent;
  }

  private write(socket: Writable, data: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      socket.write(data, (error) => {
        if (error) {
          reject(TransferError.io(`Write failed: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  private linger(socket: net.Socket): Promise<void> {
    if (socket.destroyed) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        socket.off('close', done);
        resolve();
      };
      const timer = setTimeout(done, this.lingerMs);
      socket.once('close', done);
      socket.resume();
    });
  }
}
