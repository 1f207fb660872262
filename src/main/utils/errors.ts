export type TransferErrorKind =
  | 'FileNotFound'
  | 'NameTooLong'
  | 'IncompleteStream'
  | 'HandshakeFailure'
  | 'IOFailure'
  | 'InvalidFilename';

export class TransferError extends Error {
  constructor(
    public readonly kind: TransferErrorKind,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'TransferError';
  }

  static fileNotFound(filePath: string, details?: unknown): TransferError {
    return new TransferError('FileNotFound', `File not found: ${filePath}`, details);
  }

  static nameTooLong(byteLength: number, max: number): TransferError {
    return new TransferError(
      'NameTooLong',
      `Filename encodes to ${byteLength} bytes (max ${max} in UTF-8)`
    );
  }

  static incompleteStream(expected: number, received: number, details?: unknown): TransferError {
    return new TransferError(
      'IncompleteStream',
      `Stream ended after ${received} of ${expected} expected bytes`,
      details
    );
  }

  static handshake(message: string, details?: unknown): TransferError {
    return new TransferError('HandshakeFailure', message, details);
  }

  static io(message: string, details?: unknown): TransferError {
    return new TransferError('IOFailure', message, details);
  }

  static invalidFilename(filename: string): TransferError {
    return new TransferError('InvalidFilename', `Refusing to store file as "${filename}"`);
  }

  /** Wraps anything that is not already a TransferError under `fallback`. */
  static from(error: unknown, fallback: TransferErrorKind = 'IOFailure'): TransferError {
    if (error instanceof TransferError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransferError(fallback, message, error);
  }
}

export function isTransferError(error: unknown, kind?: TransferErrorKind): error is TransferError {
  return error instanceof TransferError && (kind === undefined || error.kind === kind);
}

export function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}
