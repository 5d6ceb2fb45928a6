import { promises as fs } from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors/pipeline.errors';

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/** Reads and parses a JSON file; parse errors carry the file path. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new SyntaxError(
      `Invalid JSON in ${filePath}: ${errorMessage(error)}`,
    );
  }
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
  indent = 2,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(data, null, indent)}\n`, 'utf-8');
}
