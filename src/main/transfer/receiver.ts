import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as net from 'net';
import * as path from 'path';
import { performance } from 'perf_hooks';
import PQueue from 'p-queue';
import { decodeHeader } from '../protocol/framing';
import { ExactReader, type ByteSource } from '../protocol/exactReader';
import type { SecureChannel } from '../network/secureChannel';
import type { MetricsRecorder } from '../metrics/metricsRecorder';
import { ConnectionLifecycle } from './connectionState';
import { logger } from '../utils/logger';
import { TransferError } from '../utils/errors';
import { resolveDestination } from '../utils/pathSecurity';
import { ensureChunkSize, ensureNumber } from '../utils/validation';
import type { PeerAddress, TransferFailure, TransferRecord } from '../../shared/types/transfer';

export interface ReceiverOptions {
  /** Defaults to all interfaces. */
  host?: string;
  /** 0 picks an ephemeral port. */
  port: number;
  chunkSize: number;
  receiveDir: string;
  recorder: MetricsRecorder;
  /** Server-role channel; when present every accepted socket is upgraded to TLS. */
  secureChannel?: SecureChannel | null;
}

export interface ChunkSink {
  write(data: Buffer): Promise<void>;
}

/**
 * Drains exactly `fileSize` bytes from `source` into `sink`, reading at most
 * `chunkSize` bytes at a time. Returns the number of reads issued.
 */
export async function receivePayload(
  source: ByteSource,
  sink: ChunkSink,
  fileSize: bigint,
  chunkSize: number
): Promise<number> {
  let remaining = fileSize;
  let reads = 0;

  while (remaining > 0n) {
    const length = remaining < BigInt(chunkSize) ? Number(remaining) : chunkSize;
    const chunk = await source.readExact(length);
    await sink.write(chunk);
    remaining -= BigInt(chunk.length);
    reads++;
  }

  return reads;
}

export function fileSink(handle: fs.FileHandle): ChunkSink {
  return {
    async write(data: Buffer): Promise<void> {
      let offset = 0;
      while (offset < data.length) {
        const { bytesWritten } = await handle.write(data, offset, data.length - offset);
        offset += bytesWritten;
      }
    },
  };
}

/**
 * Accepts connections and processes them strictly one at a time, in
 * acceptance order: handshake, header, payload, metrics record. A failure on
 * one connection is logged and reported through `transfer-failed`; the next
 * connection is processed regardless.
 *
 * Events: `transfer-complete` (TransferRecord), `transfer-failed` (TransferFailure).
 */
export class FileReceiver extends EventEmitter {
  private server: net.Server | null = null;
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly host: string;
  private readonly port: number;
  private readonly chunkSize: number;
  private readonly receiveDir: string;
  private readonly recorder: MetricsRecorder;
  private readonly secureChannel: SecureChannel | null;

  constructor(options: ReceiverOptions) {
    super();
    this.host = options.host ?? '0.0.0.0';
    this.port = ensureNumber(options.port, 'port', { min: 0, max: 65535, integer: true });
    this.chunkSize = ensureChunkSize(options.chunkSize);
    this.receiveDir = options.receiveDir;
    this.recorder = options.recorder;
    this.secureChannel = options.secureChannel ?? null;

    if (this.secureChannel && this.secureChannel.role !== 'server') {
      throw new Error('FileReceiver requires a server-role SecureChannel');
    }
  }

  get secure(): boolean {
    return this.secureChannel !== null;
  }

  start(): Promise<net.AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('Receiver is already running'));
    }

    return new Promise<net.AddressInfo>((resolve, reject) => {
      const server = net.createServer((socket) => this.enqueue(socket));

      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        server.on('error', (error) => {
          logger.error('Receiver server error:', error);
        });

        const address = server.address();
        if (!address || typeof address === 'string') {
          server.close();
          reject(new Error('Receiver is not bound to a TCP address'));
          return;
        }

        this.server = server;
        logger.info(`Receiver listening on ${address.address}:${address.port}`, {
          secure: this.secure,
          receiveDir: this.receiveDir,
          metricsFile: this.recorder.path,
        });
        resolve(address);
      });
    });
  }

  /** Stops accepting, lets already-accepted connections finish, then closes. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await this.queue.onIdle();
    await closed;
    logger.info('Receiver stopped');
  }

  private enqueue(socket: net.Socket): void {
    socket.on('error', (error) => {
      logger.debug(`Socket error from ${socket.remoteAddress}:${socket.remotePort}: ${error.message}`);
    });

    void this.queue
      .add(() => this.handleConnection(socket))
      .catch((error) => {
        logger.error('Unexpected failure while handling connection:', error);
      });
  }

  private async handleConnection(raw: net.Socket): Promise<void> {
    const peer: PeerAddress = {
      address: raw.remoteAddress ?? 'unknown',
      port: raw.remotePort ?? 0,
    };
    const lifecycle = new ConnectionLifecycle();
    let channel: net.Socket = raw;
    let reader: ExactReader | null = null;

    logger.debug(`Connection received from ${peer.address}:${peer.port}`);

    try {
      if (this.secureChannel) {
        channel = await this.secureChannel.accept(raw);
        channel.on('error', (error) => {
          logger.debug(`TLS error from ${peer.address}:${peer.port}: ${error.message}`);
        });
      }

      const timestamp = new Date();
      const start = performance.now();
      reader = new ExactReader(channel, { highWaterMark: this.chunkSize * 4 });

      const header = await decodeHeader(reader, (field) => lifecycle.transition(field));
      const destination = resolveDestination(header.filename, this.receiveDir);
      lifecycle.transition('RECEIVING_PAYLOAD');

      logger.info(
        `Receiving '${header.filename}' (${header.fileSize} bytes) from ${peer.address}:${peer.port}`
      );

      await fs.mkdir(path.dirname(destination), { recursive: true });
      const handle = await fs.open(destination, 'w');
      try {
        await receivePayload(reader, fileSink(handle), header.fileSize, this.chunkSize);
      } finally {
        await handle.close();
      }

      const durationSeconds = (performance.now() - start) / 1000;
      lifecycle.transition('COMPLETE');
      logger.info(`Saved ${destination} in ${durationSeconds.toFixed(6)} s`);

      const record: TransferRecord = await this.recorder.append({
        timestamp,
        clientAddress: peer.address,
        clientPort: peer.port,
        filename: header.filename,
        fileSizeBytes: header.fileSize,
        durationSeconds,
      });
      this.emit('transfer-complete', record);
    } catch (error) {
      const failure = TransferError.from(error, 'IOFailure');
      const state = lifecycle.fail();
      logger.error(
        `Transfer from ${peer.address}:${peer.port} failed in ${state}: ${failure.message}`,
        { kind: failure.kind }
      );
      const event: TransferFailure = { peer, state, error: failure };
      this.emit('transfer-failed', event);
    } finally {
      reader?.dispose();
      channel.destroy();
      raw.destroy();
    }
  }
}
