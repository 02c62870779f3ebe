import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import {
  createJsonEngineContext,
  type JsonEngineContext,
} from '@payloadprobe/core';

export interface FileFixture {
  dir: string;
  write(name: string, content: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createFileFixture(): Promise<FileFixture> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'payloadprobe-cli-'));
  return {
    dir,
    async write(name, content) {
      const filePath = path.join(dir, name);
      await writeFile(filePath, content, 'utf8');
      return filePath;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export function recordingContext() {
  const logger = { debug: vi.fn(), warn: vi.fn() };
  const ctx: JsonEngineContext = createJsonEngineContext({ logger });
  return { ctx, logger };
}
