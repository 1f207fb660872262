// Transfer header framing.
//
//   [2 bytes BE uint16 nameLen] [nameLen bytes UTF-8 name] [8 bytes BE uint64 fileSize]
//
// The payload follows the header directly; its length is the declared fileSize.

import type { HeaderField, TransferHeader } from '../../shared/types/transfer';
import { TransferError } from '../utils/errors';
import type { ByteSource } from './exactReader';

export const NAME_LENGTH_BYTES = 2;
export const FILE_SIZE_BYTES = 8;
export const MAX_FILENAME_BYTES = 0xffff;
export const MAX_FILE_SIZE = 0xffff_ffff_ffff_ffffn;

export function encodeHeader(filename: string, fileSize: bigint | number): Buffer {
  const nameBytes = Buffer.from(filename, 'utf8');
  if (nameBytes.length > MAX_FILENAME_BYTES) {
    throw TransferError.nameTooLong(nameBytes.length, MAX_FILENAME_BYTES);
  }

  const size = typeof fileSize === 'bigint' ? fileSize : BigInt(fileSize);
  if (size < 0n || size > MAX_FILE_SIZE) {
    throw new RangeError(`File size ${size} does not fit in an unsigned 64-bit integer`);
  }

  const header = Buffer.alloc(NAME_LENGTH_BYTES + nameBytes.length + FILE_SIZE_BYTES);
  header.writeUInt16BE(nameBytes.length, 0);
  nameBytes.copy(header, NAME_LENGTH_BYTES);
  header.writeBigUInt64BE(size, NAME_LENGTH_BYTES + nameBytes.length);
  return header;
}

/**
 * Read one header from `source`.
 *
 * `onField` is called before each of the three reads with the field being
 * awaited. Invalid UTF-8 in the name is replaced, not rejected.
 */
export async function decodeHeader(
  source: ByteSource,
  onField?: (field: HeaderField) => void
): Promise<TransferHeader> {
  onField?.('AWAITING_NAME_LEN');
  const nameLength = (await source.readExact(NAME_LENGTH_BYTES)).readUInt16BE(0);

  onField?.('AWAITING_NAME');
  const filename = (await source.readExact(nameLength)).toString('utf8');

  onField?.('AWAITING_SIZE');
  const fileSize = (await source.readExact(FILE_SIZE_BYTES)).readBigUInt64BE(0);

  return { filename, fileSize };
}
