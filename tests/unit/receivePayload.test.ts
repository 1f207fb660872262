import { Readable } from 'stream';
import { receivePayload, type ChunkSink } from '../../src/main/transfer/receiver';
import { ExactReader, type ByteSource } from '../../src/main/protocol/exactReader';
import { patternBytes } from '../helpers';

class RecordingSource implements ByteSource {
  readonly requests: number[] = [];
  private offset = 0;

  constructor(private readonly data: Buffer) {}

  async readExact(length: number): Promise<Buffer> {
    this.requests.push(length);
    if (this.offset + length > this.data.length) {
      throw new Error('source exhausted');
    }
    const chunk = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return chunk;
  }
}

class MemorySink implements ChunkSink {
  readonly chunks: Buffer[] = [];

  async write(data: Buffer): Promise<void> {
    this.chunks.push(Buffer.from(data));
  }

  get contents(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

describe('receivePayload', () => {
  it('should drain 10000 bytes in chunk-bounded reads and stop', async () => {
    const data = patternBytes(12_000);
    const source = new RecordingSource(data);
    const sink = new MemorySink();

    const reads = await receivePayload(source, sink, 10_000n, 4096);

    expect(reads).toBe(3);
    expect(source.requests).toEqual([4096, 4096, 1808]);
    expect(Buffer.compare(sink.contents, data.subarray(0, 10_000))).toBe(0);
  });

  it('should issue no reads for an empty payload', async () => {
    const source = new RecordingSource(Buffer.alloc(0));
    const sink = new MemorySink();

    const reads = await receivePayload(source, sink, 0n, 4096);

    expect(reads).toBe(0);
    expect(source.requests).toEqual([]);
    expect(sink.chunks).toHaveLength(0);
  });

  it('should use a single read for a payload of exactly one chunk', async () => {
    const source = new RecordingSource(patternBytes(4096));
    const sink = new MemorySink();

    await receivePayload(source, sink, 4096n, 4096);

    expect(source.requests).toEqual([4096]);
  });

  it('should keep the chunks written before the stream ended early', async () => {
    const reader = new ExactReader(Readable.from([patternBytes(40)]));
    const sink = new MemorySink();

    await expect(receivePayload(reader, sink, 100n, 16)).rejects.toMatchObject({
      kind: 'IncompleteStream',
    });
    expect(sink.contents.length).toBe(32);
  });
});
