// filewire - length-prefixed file transfer over TCP with optional TLS.

export {
  encodeHeader,
  decodeHeader,
  MAX_FILENAME_BYTES,
  MAX_FILE_SIZE,
} from './protocol/framing';
export { ExactReader, type ByteSource, type ExactReaderOptions } from './protocol/exactReader';
export { SecureChannel, loadSecureClient, loadSecureServer } from './network/secureChannel';
export {
  generateCertificates,
  writeCertificates,
  type CertificatePair,
  type CertificateOptions,
} from './network/certificates';
export { FileSender, type SenderOptions } from './transfer/sender';
export {
  FileReceiver,
  receivePayload,
  fileSink,
  type ReceiverOptions,
  type ChunkSink,
} from './transfer/receiver';
export { ConnectionLifecycle } from './transfer/connectionState';
export {
  MetricsRecorder,
  METRICS_COLUMNS,
  computeThroughput,
  formatRecord,
} from './metrics/metricsRecorder';
export { defaultConfig, loadConfigFile, resolveConfig, envOverrides } from './config/config';
export { TransferError, isTransferError, type TransferErrorKind } from './utils/errors';
export { logger, initializeLogger } from './utils/logger';

export type * from '../shared/types/transfer';
export type * from '../shared/types/config';
