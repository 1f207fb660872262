#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import { envOverrides, loadConfigFile, resolveConfig } from './config/config';
import { generateCertificates, writeCertificates } from './network/certificates';
import { loadSecureClient, loadSecureServer } from './network/secureChannel';
import { MetricsRecorder } from './metrics/metricsRecorder';
import { FileSender } from './transfer/sender';
import { FileReceiver } from './transfer/receiver';
import { initializeLogger, logger } from './utils/logger';
import { ensureChunkSize, ensurePort, parseInteger } from './utils/validation';
import type { FilewireConfig, FilewireConfigOverrides } from '../shared/types/config';

interface CommonOptions {
  config?: string;
  secure?: boolean;
  chunkSize?: string;
}

interface SendCommandOptions extends CommonOptions {
  repeat: string;
  ca?: string;
  verifyHostname?: boolean;
}

interface ServeCommandOptions extends CommonOptions {
  host: string;
  cert?: string;
  key?: string;
  receiveDir?: string;
  metrics?: string;
}

interface CertsCommandOptions {
  commonName: string;
  days: string;
}

async function resolveCliConfig(
  options: CommonOptions,
  flags: FilewireConfigOverrides
): Promise<Readonly<FilewireConfig>> {
  const fileLayer = options.config ? await loadConfigFile(options.config) : {};
  const chunkLayer: FilewireConfigOverrides = options.chunkSize
    ? { chunkSize: ensureChunkSize(parseInteger(options.chunkSize, 'chunk-size'), 'chunk-size') }
    : {};

  const config = resolveConfig(
    Boolean(options.secure),
    fileLayer,
    envOverrides(),
    chunkLayer,
    flags
  );
  initializeLogger({ level: config.logLevel, logDir: config.logDir });
  return config;
}

export async function runSend(
  host: string,
  rawPort: string,
  file: string,
  options: SendCommandOptions
): Promise<number> {
  try {
    const port = ensurePort(parseInteger(rawPort, 'port'));
    const repeat = parseInteger(options.repeat, 'repeat', { min: 1 });
    const config = await resolveCliConfig(options, {
      tls: { trustAnchorFile: options.ca, verifyHostname: options.verifyHostname },
    });

    const secureChannel = options.secure
      ? await loadSecureClient(config.tls.trustAnchorFile, config.tls.verifyHostname)
      : null;
    const sender = new FileSender({ chunkSize: config.chunkSize, secureChannel });

    await sender.sendRepeated(host, port, file, repeat);
    logger.info('All sends completed');
    return 0;
  } catch (error) {
    logger.error(`Send failed: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export async function runServe(
  rawPort: string,
  options: ServeCommandOptions,
  untilStopped: () => Promise<unknown> = waitForShutdownSignal
): Promise<number> {
  try {
    const port = ensurePort(parseInteger(rawPort, 'port'));
    const config = await resolveCliConfig(options, {
      receiveDir: options.receiveDir,
      metricsFile: options.metrics,
      tls: { certFile: options.cert, keyFile: options.key },
    });

    const secureChannel = options.secure
      ? await loadSecureServer(config.tls.certFile, config.tls.keyFile)
      : null;
    const receiver = new FileReceiver({
      host: options.host,
      port,
      chunkSize: config.chunkSize,
      receiveDir: config.receiveDir,
      recorder: new MetricsRecorder(config.metricsFile),
      secureChannel,
    });

    await receiver.start();
    logger.info(`Received files are stored in ${path.resolve(config.receiveDir)}`);
    logger.info(`Transfer metrics are appended to ${path.resolve(config.metricsFile)}`);

    const reason = await untilStopped();
    logger.info(`Shutting down (${String(reason)})`);
    await receiver.stop();
    return 0;
  } catch (error) {
    logger.error(`Receiver failed: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

export async function runCerts(outDir: string, options: CertsCommandOptions): Promise<number> {
  try {
    const days = parseInteger(options.days, 'days', { min: 1 });
    const pair = generateCertificates({ commonName: options.commonName, days });
    await writeCertificates(outDir, pair);
    return 0;
  } catch (error) {
    logger.error(
      `Certificate generation failed: ${error instanceof Error ? error.message : String(error)}`
    );
    return 1;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('filewire')
    .description('Length-prefixed file transfer over TCP, optionally over TLS')
    .version('1.0.0');

  program
    .command('send <host> <port> <file>')
    .description('Send a file to a receiver')
    .option('-r, --repeat <count>', 'Number of times to send the file', '1')
    .option('-s, --secure', 'Upgrade each connection to TLS')
    .option('--ca <path>', 'Trust anchor certificate (PEM) used to validate the receiver')
    .option('--verify-hostname', 'Also check the certificate against <host>')
    .option('--chunk-size <bytes>', 'Payload chunk size')
    .option('-c, --config <path>', 'Path to configuration JSON file')
    .action(async (host: string, port: string, file: string, options: SendCommandOptions) => {
      process.exitCode = await runSend(host, port, file, options);
    });

  program
    .command('serve <port>')
    .description('Receive files until interrupted')
    .option('-H, --host <address>', 'Address to bind', '0.0.0.0')
    .option('-s, --secure', 'Require TLS on every connection')
    .option('--cert <path>', 'Server certificate (PEM)')
    .option('--key <path>', 'Server private key (PEM)')
    .option('--receive-dir <dir>', 'Directory for received files')
    .option('--metrics <file>', 'CSV file for transfer metrics')
    .option('--chunk-size <bytes>', 'Payload chunk size')
    .option('-c, --config <path>', 'Path to configuration JSON file')
    .action(async (port: string, options: ServeCommandOptions) => {
      process.exitCode = await runServe(port, options);
    });

  program
    .command('certs <outDir>')
    .description('Generate a self-signed certificate and key for TLS mode')
    .option('--common-name <name>', 'Certificate common name', 'filewire')
    .option('--days <n>', 'Validity in days', '365')
    .action(async (outDir: string, options: CertsCommandOptions) => {
      process.exitCode = await runCerts(outDir, options);
    });

  return program;
}

if (require.main === module) {
  void buildProgram()
    .parseAsync(process.argv)
    .catch((error) => {
      logger.error('CLI command failed', { error });
      process.exit(1);
    });
}
