import * as fs from 'fs/promises';
import * as path from 'path';
import PQueue from 'p-queue';
import { logger } from '../utils/logger';
import { TransferError, errorCode } from '../utils/errors';
import type { TransferMeasurement, TransferRecord } from '../../shared/types/transfer';

export const METRICS_COLUMNS = [
  'timestamp',
  'client_ip',
  'client_port',
  'filename',
  'file_size_bytes',
  'duration_seconds',
  'throughput_bytes_per_second',
] as const;

const LINE_END = '\r\n';

export function computeThroughput(fileSizeBytes: bigint, durationSeconds: number): number {
  return durationSeconds > 0 ? Number(fileSizeBytes) / durationSeconds : 0;
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** ISO-8601 local wall-clock time, second precision, no zone designator. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day}T${time}`;
}

export function formatRecord(record: TransferRecord): string {
  return [
    formatTimestamp(record.timestamp),
    record.clientAddress,
    String(record.clientPort),
    record.filename,
    record.fileSizeBytes.toString(),
    record.durationSeconds.toFixed(6),
    record.throughputBytesPerSecond.toFixed(6),
  ]
    .map(escapeField)
    .join(',');
}

/**
 * Append-only CSV store with one line per completed transfer.
 *
 * Appends are serialized through a single-slot queue, so the header is
 * written exactly once even if callers overlap.
 */
export class MetricsRecorder {
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async append(measurement: TransferMeasurement): Promise<TransferRecord> {
    const record: TransferRecord = Object.freeze({
      ...measurement,
      timestamp: new Date(measurement.timestamp.getTime()),
      throughputBytesPerSecond: computeThroughput(
        measurement.fileSizeBytes,
        measurement.durationSeconds
      ),
    });

    await this.queue.add(() => this.write(record));
    return record;
  }

  private async write(record: TransferRecord): Promise<void> {
    try {
      const exists = await this.storeExists();
      if (!exists) {
        await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      }

      const header = exists ? '' : METRICS_COLUMNS.join(',') + LINE_END;
      await fs.appendFile(this.filePath, header + formatRecord(record) + LINE_END, 'utf-8');
      logger.debug('Transfer metrics recorded', { file: this.filePath, filename: record.filename });
    } catch (error) {
      logger.error('Failed to record transfer metrics:', error);
      throw TransferError.io(`Unable to append to ${this.filePath}`, error);
    }
  }

  private async storeExists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}
