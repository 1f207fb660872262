import * as fs from 'fs/promises';
import * as path from 'path';
import { generateCertificates } from '../../src/main/network/certificates';
import { SecureChannel } from '../../src/main/network/secureChannel';
import { MetricsRecorder } from '../../src/main/metrics/metricsRecorder';
import { FileReceiver } from '../../src/main/transfer/receiver';
import { FileSender } from '../../src/main/transfer/sender';
import { isTransferError } from '../../src/main/utils/errors';
import type { TransferFailure, TransferRecord } from '../../src/shared/types/transfer';
import { makeTempDir, nextEvent, pathExists, patternBytes, sendRaw } from '../helpers';

describe('TLS trust anchor', () => {
  const server = generateCertificates({ commonName: 'localhost' });
  const impostor = generateCertificates({ commonName: 'localhost' });

  let tempDir: string;
  let receiveDir: string;
  let metricsFile: string;
  let source: string;
  let receiver: FileReceiver;
  let port: number;

  const senderTrusting = (anchor: string, verifyHostname = false): FileSender =>
    new FileSender({
      chunkSize: 1024,
      secureChannel: SecureChannel.forClient({ trustAnchor: anchor, verifyHostname }),
      lingerMs: 2000,
    });

  beforeEach(async () => {
    tempDir = await makeTempDir('trust');
    receiveDir = path.join(tempDir, 'received_tls');
    metricsFile = path.join(tempDir, 'metrics_tls.csv');
    source = path.join(tempDir, 'payload.bin');
    await fs.writeFile(source, patternBytes(2048));

    receiver = new FileReceiver({
      host: '127.0.0.1',
      port: 0,
      chunkSize: 4096,
      receiveDir,
      recorder: new MetricsRecorder(metricsFile),
      secureChannel: SecureChannel.forServer({ cert: server.cert, key: server.key }),
    });
    port = (await receiver.start()).port;
  });

  afterEach(async () => {
    await receiver.stop();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should refuse a server whose certificate is not the trust anchor', async () => {
    const failed = nextEvent<TransferFailure>(receiver, 'transfer-failed');

    await expect(senderTrusting(impostor.cert).send('127.0.0.1', port, source)).rejects.toMatchObject(
      { kind: 'HandshakeFailure' }
    );
    const failure = await failed;

    // The client checks the chain once the TLS exchange itself is done, so the
    // receiver sees either a failed handshake or a channel closed before the header.
    expect(['IDLE', 'AWAITING_NAME_LEN']).toContain(failure.state);
    expect(
      isTransferError(failure.error, 'HandshakeFailure') ||
        isTransferError(failure.error, 'IncompleteStream')
    ).toBe(true);
    expect(await pathExists(path.join(receiveDir, 'payload.bin'))).toBe(false);
    expect(await pathExists(metricsFile)).toBe(false);
  });

  it('should keep serving trusted clients after a failed handshake', async () => {
    const failed = nextEvent<TransferFailure>(receiver, 'transfer-failed');
    await expect(senderTrusting(impostor.cert).send('127.0.0.1', port, source)).rejects.toThrow();
    await failed;

    const completed = nextEvent<TransferRecord>(receiver, 'transfer-complete');
    await senderTrusting(server.cert).send('127.0.0.1', port, source);

    expect((await completed).filename).toBe('payload.bin');
    expect((await fs.readFile(path.join(receiveDir, 'payload.bin'))).equals(patternBytes(2048))).toBe(
      true
    );
  });

  it('should skip the host name check unless asked for it', async () => {
    const failed = nextEvent<TransferFailure>(receiver, 'transfer-failed');

    await expect(
      senderTrusting(server.cert, true).send('127.0.0.1', port, source)
    ).rejects.toMatchObject({ kind: 'HandshakeFailure' });
    await failed;

    const completed = nextEvent<TransferRecord>(receiver, 'transfer-complete');
    await senderTrusting(server.cert, false).send('127.0.0.1', port, source);
    expect((await completed).fileSizeBytes).toBe(2048n);
  });

  it('should drop a plaintext client on a TLS receiver', async () => {
    const failed = nextEvent<TransferFailure>(receiver, 'transfer-failed');

    await sendRaw(port, Buffer.from('\u0000\u0004evil'));
    const failure = await failed;

    expect(failure.state).toBe('IDLE');
    expect(isTransferError(failure.error, 'HandshakeFailure')).toBe(true);
    expect(await pathExists(path.join(receiveDir, 'evil'))).toBe(false);
  });
});
