import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Write a JSON document atomically: the content goes to a sibling temp file
 * which is then renamed over the target, so readers never see a partial file.
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const content = `${JSON.stringify(data, null, 2)}\n`;

  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Read and parse a JSON file.
 * Returns null if the file doesn't exist; the parsed value is left for the caller to validate.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Read the last `count` non-empty lines of a text file.
 * Returns null if the file doesn't exist.
 */
export async function readTailLines(filePath: string, count: number): Promise<string[] | null> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
    return lines.slice(-count);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
