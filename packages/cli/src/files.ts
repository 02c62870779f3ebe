import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError } from '@payloadprobe/core';

export function resolvePath(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

/**
 * Reads a UTF-8 input file named on the command line.
 */
export function readInputFile(filePath: string): string {
  const resolved = resolvePath(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError({
      message: `File not found: ${resolved}`,
      context: { path: resolved },
    });
  }
  return fs.readFileSync(resolved, 'utf8');
}
