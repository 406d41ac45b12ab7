import { readFile, appendFile, mkdir, readdir, access } from 'fs/promises';
import { dirname, join } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await access(dirPath);
  } catch {
    await mkdir(dirPath, { recursive: true });
  }
}

/**
 * Async read file safely, returns null if the file can't be read
 */
export async function readFileSafeAsync(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Append one line (newline-terminated) with automatic directory creation
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await appendFile(filePath, line.endsWith('\n') ? line : `${line}\n`, 'utf-8');
}

/**
 * Files directly inside `dir` with the given extension, sorted by name.
 * Missing directories yield an empty list.
 */
export async function listFiles(dir: string, extension: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch {
    return [];
  }
  return names
    .filter((name) => name.endsWith(extension))
    .sort()
    .map((name) => join(dir, name));
}
