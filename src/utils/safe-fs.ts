/**
 * Path-validated text file access for the CLI and config loader.
 *
 * Every path is resolved to an absolute path and checked before any file
 * system call is made.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, contains null bytes or is not a string.
 */
export function validatePath(filePath: unknown): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file, creating missing parent directories.
 *
 * @param filePath - The file to write.
 * @param data - Text to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- derived from a validated path
  await fs.mkdir(path.dirname(validatedPath), { recursive: true });
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  await fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Checks whether a path exists.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}
