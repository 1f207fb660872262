import * as path from 'path';
import { logger } from './logger';
import { TransferError } from './errors';

/**
 * Security utility for placing received files
 * Keeps peer-supplied names inside the receive directory
 */

/**
 * Resolves a file path and ensures it stays within the base directory
 * @param filePath - Relative or absolute path supplied by a peer
 * @param baseDir - The directory the path must stay within
 * @returns Resolved absolute path
 * @throws TransferError (InvalidFilename) if the path escapes `baseDir`
 */
export function sanitizePath(filePath: string, baseDir: string): string {
  const normalizedBase = path.resolve(baseDir);
  const resolved = path.resolve(normalizedBase, path.normalize(filePath));

  if (!resolved.startsWith(normalizedBase + path.sep)) {
    logger.error(
      `Path traversal attempt detected: ${filePath} (resolved: ${resolved}, base: ${normalizedBase})`
    );
    throw TransferError.invalidFilename(filePath);
  }

  return resolved;
}

/**
 * Quick structural check on a received filename
 * @returns true if the name is non-empty, has no NUL byte and is not absolute
 */
export function isFilenameSafe(filename: string): boolean {
  if (filename.length === 0 || filename.includes('\0')) {
    return false;
  }
  return !path.isAbsolute(filename) && !path.win32.isAbsolute(filename);
}

/**
 * Destination for a received file
 * @throws TransferError (InvalidFilename) if validation fails
 */
export function resolveDestination(filename: string, receiveDir: string): string {
  if (!isFilenameSafe(filename)) {
    throw TransferError.invalidFilename(filename);
  }
  return sanitizePath(filename, receiveDir);
}
