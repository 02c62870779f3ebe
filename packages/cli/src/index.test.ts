import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { getExitCode, ErrorCode } from '@payloadprobe/core';
import { main } from './index.js';
import { createFileFixture, type FileFixture } from './__tests__/fixtures';

function captureOutput() {
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const errorChunks: string[] = [];
  const stdoutSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      stdoutChunks.push(String(chunk));
      return true;
    });
  const stderrSpy = vi
    .spyOn(process.stderr, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      stderrChunks.push(String(chunk));
      return true;
    });
  const consoleErrorSpy = vi
    .spyOn(console, 'error')
    .mockImplementation((msg?: unknown) => {
      if (msg !== undefined) errorChunks.push(String(msg));
    });
  const exitSpy = vi
    .spyOn(process, 'exit')
    .mockImplementation((code?: string | number | null): never => {
      throw new Error(`EXIT:${String(code ?? 0)}`);
    });
  return {
    stdout: () => stdoutChunks.join(''),
    stderr: () => stderrChunks.join(''),
    errors: () => errorChunks.join('\n'),
    restore: () => {
      stdoutSpy.mockRestore();
      stderrSpy.mockRestore();
      consoleErrorSpy.mockRestore();
      exitSpy.mockRestore();
    },
  };
}

describe('payloadprobe CLI', () => {
  let files: FileFixture;

  beforeEach(async () => {
    files = await createFileFixture();
  });

  afterEach(async () => {
    await files.cleanup();
  });

  it('prints the mutated payload', async () => {
    const payload = await files.write('pet.json', '{"pet":{"tags":["a"]}}');
    const output = captureOutput();
    try {
      await main([
        'node',
        'payloadprobe',
        'mutate',
        '--payload',
        payload,
        '--path',
        'pet#tags',
        '--value',
        '1',
      ]);
    } finally {
      output.restore();
    }
    expect(output.stdout()).toBe('{"pet":{"tags":1}}\n');
  });

  it('prints fuzz cases as NDJSON', async () => {
    const payload = await files.write('pet.json', '{"tags":["a"]}');
    const output = captureOutput();
    try {
      await main([
        'node',
        'payloadprobe',
        'fuzz',
        '--payload',
        payload,
        '--fields',
        'tags',
      ]);
    } finally {
      output.restore();
    }
    const lines = output.stdout().trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      fuzzer: 'ReplaceArraysWithPrimitives',
      payload: '{"tags":"probe_primitive_string"}',
    });
  });

  it('renders errors and exits with their exit code', async () => {
    const output = captureOutput();
    try {
      await expect(
        main([
          'node',
          'payloadprobe',
          'match',
          '--code',
          '200',
          '--body',
          `${files.dir}/absent.txt`,
        ])
      ).rejects.toThrow(
        `EXIT:${getExitCode(ErrorCode.CONFIGURATION_ERROR)}`
      );
    } finally {
      output.restore();
    }
    expect(output.errors()).toContain('Error E300: File not found:');
  });

  // runs last: commander keeps the global --verbose value between parses
  it('logs the serialized error with --verbose', async () => {
    const output = captureOutput();
    try {
      await expect(
        main([
          'node',
          'payloadprobe',
          '--verbose',
          'match',
          '--code',
          '200',
          '--body',
          `${files.dir}/absent.txt`,
        ])
      ).rejects.toThrow('EXIT:');
    } finally {
      output.restore();
    }
    expect(output.stderr()).toContain(
      '[payloadprobe] debug: Error details {"error":{"name":"ConfigurationError","message":"File not found:'
    );
  });
});
