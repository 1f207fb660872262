export interface TransferHeader {
  filename: string;
  fileSize: bigint;
}

export interface TransferResult {
  filename: string;
  fileSizeBytes: bigint;
  bytesSent: bigint;
  durationSeconds: number;
  secure: boolean;
  attempt: number;
}

/** Everything the receiver knows about a finished transfer before throughput is derived. */
export interface TransferMeasurement {
  timestamp: Date;
  clientAddress: string;
  clientPort: number;
  filename: string;
  fileSizeBytes: bigint;
  durationSeconds: number;
}

export interface TransferRecord extends TransferMeasurement {
  throughputBytesPerSecond: number;
}

export type HeaderField = 'AWAITING_NAME_LEN' | 'AWAITING_NAME' | 'AWAITING_SIZE';

export type ReceiverState =
  | 'IDLE'
  | HeaderField
  | 'RECEIVING_PAYLOAD'
  | 'COMPLETE'
  | 'FAILED';

export interface PeerAddress {
  address: string;
  port: number;
}

export interface TransferFailure {
  peer: PeerAddress;
  state: ReceiverState;
  error: Error;
}
