/**
 * File system operations used by the store.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Delete a file. Returns false when there was nothing to delete.
 */
export async function removeFile(filePath: string): Promise<boolean> {
  if (!(await fileExists(filePath))) {
    return false;
  }
  await fs.promises.unlink(filePath);
  return true;
}

/**
 * Names of the subdirectories of a directory; empty when it does not exist.
 */
export async function listSubdirectories(dirPath: string): Promise<string[]> {
  if (!(await isDirectory(dirPath))) {
    return [];
  }
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  return entries.filter((e) => e.isDirectory()).map((e) => e.name);
}

/**
 * Names of the files in a directory with the given extension.
 */
export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  if (!(await isDirectory(dirPath))) {
    return [];
  }
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && path.extname(e.name) === extension)
    .map((e) => e.name);
}
