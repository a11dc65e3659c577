/**
 * Path-validated file system helpers.
 *
 * Every persistence module (state file, audit trail, phase-agent map, config)
 * goes through these wrappers so that empty paths or paths carrying null bytes
 * are rejected before any file system call is made.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

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
 * Validates a file system path and resolves it to an absolute path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return path.resolve(filePath);
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Reads a UTF-8 text file, returning `undefined` when it does not exist.
 *
 * Any error other than ENOENT is rethrown.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents, or undefined if the file is missing.
 */
export async function safeReadFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await safeReadFile(filePath);
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Creates a directory (and its parents) after validating the path.
 *
 * @param dirPath - The directory to create.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Renames a file after validating both paths.
 *
 * @param oldPath - The current path.
 * @param newPath - The target path.
 */
export async function safeRename(oldPath: string, newPath: string): Promise<void> {
  const validatedOldPath = validatePath(oldPath);
  const validatedNewPath = validatePath(newPath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- paths are validated by validatePath
  return fs.rename(validatedOldPath, validatedNewPath);
}

/**
 * Deletes a file after validating the path.
 *
 * @param filePath - The file to delete.
 */
export async function safeUnlink(filePath: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.unlink(validatedPath);
}

/**
 * Replaces a file's contents with write-to-temp-then-rename semantics.
 *
 * The parent directory is created if absent. A reader never observes a
 * partially written file: it sees either the previous contents or the new ones.
 * If any step fails the temp file is removed and the original error rethrown.
 *
 * @param filePath - The file to replace.
 * @param data - The new contents.
 */
export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  const target = validatePath(filePath);
  const tempPath = path.join(path.dirname(target), `.${path.basename(target)}-${randomUUID()}.tmp`);

  await safeMkdir(path.dirname(target));

  try {
    await safeWriteFile(tempPath, data);
    await safeRename(tempPath, target);
  } catch (error) {
    try {
      await safeUnlink(tempPath);
    } catch {
      // Temp file was never created or is already gone
    }
    throw error;
  }
}

/**
 * Tells whether an error is a Node.js ENOENT error.
 *
 * @param error - The caught value.
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error as NodeJS.ErrnoException).code === 'ENOENT'
  );
}
