import * as fs from 'fs/promises';
import * as path from 'path';
import selfsigned from 'selfsigned';
import { logger } from '../utils/logger';

export interface CertificatePair {
  cert: string;
  key: string;
}

export interface CertificateOptions {
  commonName: string;
  days?: number;
  keySize?: number;
}

export const CERT_FILE_NAME = 'cert.pem';
export const KEY_FILE_NAME = 'key.pem';

/**
 * Self-signed certificate usable both as the server certificate and as the
 * client's trust anchor.
 */
export function generateCertificates(options: CertificateOptions): CertificatePair {
  const attrs = [
    { name: 'commonName', value: options.commonName },
    { name: 'organizationName', value: 'filewire' },
  ];

  const pems = selfsigned.generate(attrs, {
    keySize: options.keySize ?? 2048,
    days: options.days ?? 365,
    algorithm: 'sha256',
    extensions: [
      {
        name: 'basicConstraints',
        cA: true,
      },
      {
        name: 'keyUsage',
        keyCertSign: true,
        digitalSignature: true,
        keyEncipherment: true,
      },
      {
        name: 'extKeyUsage',
        serverAuth: true,
      },
    ],
  });

  return { cert: pems.cert, key: pems.private };
}

export async function writeCertificates(
  outDir: string,
  pair: CertificatePair
): Promise<{ certFile: string; keyFile: string }> {
  await fs.mkdir(outDir, { recursive: true });
  const certFile = path.join(outDir, CERT_FILE_NAME);
  const keyFile = path.join(outDir, KEY_FILE_NAME);

  await Promise.all([
    fs.writeFile(certFile, pair.cert),
    fs.writeFile(keyFile, pair.key, { mode: 0o600 }),
  ]);

  logger.info(`Wrote ${certFile} and ${keyFile}`);
  return { certFile, keyFile };
}
