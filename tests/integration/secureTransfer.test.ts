import * as fs from 'fs/promises';
import * as path from 'path';
import { generateCertificates, writeCertificates } from '../../src/main/network/certificates';
import { loadSecureClient, loadSecureServer } from '../../src/main/network/secureChannel';
import { MetricsRecorder } from '../../src/main/metrics/metricsRecorder';
import { FileReceiver } from '../../src/main/transfer/receiver';
import { FileSender } from '../../src/main/transfer/sender';
import type { TransferRecord } from '../../src/shared/types/transfer';
import { collectEvents, makeTempDir, nextEvent, patternBytes } from '../helpers';

describe('TLS transfer', () => {
  let certDir: string;
  let certFile: string;
  let keyFile: string;
  let tempDir: string;
  let receiveDir: string;
  let metricsFile: string;
  let receiver: FileReceiver;
  let port: number;

  beforeAll(async () => {
    certDir = await makeTempDir('certs');
    ({ certFile, keyFile } = await writeCertificates(
      certDir,
      generateCertificates({ commonName: 'localhost' })
    ));
  });

  afterAll(async () => {
    await fs.rm(certDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    tempDir = await makeTempDir('tls-transfer');
    receiveDir = path.join(tempDir, 'received_tls');
    metricsFile = path.join(tempDir, 'metrics_tls.csv');
    receiver = new FileReceiver({
      host: '127.0.0.1',
      port: 0,
      chunkSize: 4096,
      receiveDir,
      recorder: new MetricsRecorder(metricsFile),
      secureChannel: await loadSecureServer(certFile, keyFile),
    });
    port = (await receiver.start()).port;
  });

  afterEach(async () => {
    await receiver.stop();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should deliver a file byte for byte over TLS', async () => {
    const data = patternBytes(70000);
    const source = path.join(tempDir, 'secret.bin');
    await fs.writeFile(source, data);
    const sender = new FileSender({
      chunkSize: 4096,
      secureChannel: await loadSecureClient(certFile),
      lingerMs: 2000,
    });
    const completed = nextEvent<TransferRecord>(receiver, 'transfer-complete');

    const result = await sender.send('127.0.0.1', port, source);
    const record = await completed;

    expect(receiver.secure).toBe(true);
    expect(result).toMatchObject({ secure: true, bytesSent: 70000n, fileSizeBytes: 70000n });
    expect(record.fileSizeBytes).toBe(70000n);
    expect((await fs.readFile(path.join(receiveDir, 'secret.bin'))).equals(data)).toBe(true);
  });

  it('should repeat sends over TLS with one metrics line each', async () => {
    const source = path.join(tempDir, 'twice.txt');
    await fs.writeFile(source, 'over the wire\n');
    const sender = new FileSender({
      chunkSize: 4,
      secureChannel: await loadSecureClient(certFile),
      lingerMs: 2000,
    });
    const completed = collectEvents<TransferRecord>(receiver, 'transfer-complete', 2);

    await sender.sendRepeated('127.0.0.1', port, source, 2);
    await completed;

    const lines = (await fs.readFile(metricsFile, 'utf-8')).trimEnd().split('\r\n');
    expect(lines).toHaveLength(3);
    expect(lines[1].split(',')[4]).toBe('14');
    expect(lines[2].split(',')[4]).toBe('14');
    expect(await fs.readFile(path.join(receiveDir, 'twice.txt'), 'utf-8')).toBe('over the wire\n');
  });
});
