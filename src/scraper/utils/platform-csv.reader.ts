import { promises as fs } from 'fs';
import { ConfigurationError } from '../../common/errors/pipeline.errors';

export interface PlatformEntry {
  id: string;
  name: string;
}

/** Splits one CSV line, honouring double quotes and `""` escapes. */
export function parseCsvLine(line: string, delimiter = ','): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Parses the platform list. Header names are matched case-insensitively
 * (`id`, `name`); rows without an id are ignored.
 */
export function parsePlatformsCsv(content: string, source = 'platforms CSV'): PlatformEntry[] {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);

  if (lines.length === 0) {
    throw new ConfigurationError(`${source} is empty`);
  }

  const headers = parseCsvLine(lines[0]).map((header) => header.toLowerCase());
  const idIndex = headers.indexOf('id');
  const nameIndex = headers.indexOf('name');
  if (idIndex < 0 || nameIndex < 0) {
    throw new ConfigurationError(
      `${source} must have 'id' and 'name' columns, found: ${headers.join(', ')}`,
    );
  }

  const platforms: PlatformEntry[] = [];
  for (const line of lines.slice(1)) {
    const values = parseCsvLine(line);
    const id = values[idIndex] ?? '';
    if (!id) continue;
    platforms.push({ id, name: values[nameIndex] ?? '' });
  }

  if (platforms.length === 0) {
    throw new ConfigurationError(`${source} lists no platforms`);
  }
  return platforms;
}

export async function readPlatformsCsv(filePath: string): Promise<PlatformEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    throw new ConfigurationError(`Platforms file not found: ${filePath}`);
  }
  return parsePlatformsCsv(content, filePath);
}
