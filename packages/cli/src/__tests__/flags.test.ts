import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError, MalformedJsonError } from '@payloadprobe/core';
import {
  loadMatchConfig,
  parseList,
  parseMatchFlags,
  parseResponseCode,
  parseSeed,
  resolveMatchOptions,
} from '../flags';
import { createFileFixture, type FileFixture } from './fixtures';

describe('CLI flag helpers', () => {
  describe('parseList', () => {
    it('splits and trims comma lists', () => {
      expect(parseList(' 200, 4XX ,,')).toEqual(['200', '4XX']);
      expect(parseList('')).toEqual([]);
      expect(parseList(undefined)).toBeUndefined();
    });
  });

  describe('parseMatchFlags', () => {
    it('maps flags onto match options', () => {
      expect(
        parseMatchFlags({
          matchResponseCodes: '200,4XX',
          matchResponseLines: '1, 2',
          matchResponseWords: '0',
          matchResponseSizes: '120',
          matchResponseRegex: '.*error.*',
          matchInput: true,
        })
      ).toEqual({
        responseCodes: ['200', '4XX'],
        lines: [1, 2],
        words: [0],
        sizes: [120],
        regex: '.*error.*',
        matchInput: true,
      });
    });

    it('leaves absent flags out', () => {
      expect(parseMatchFlags({})).toEqual({});
    });

    it('rejects a regex that does not compile', () => {
      expect(() => resolveMatchOptions({ matchResponseRegex: '(a' })).toThrow(
        'Invalid match configuration: /regex must be a valid regular expression'
      );
    });

    it('rejects non-integer counts', () => {
      try {
        parseMatchFlags({ matchResponseLines: '1,x,2.5' });
        expect.unreachable('expected a ConfigurationError');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (!(error instanceof ConfigurationError)) return;
        expect(error.failures).toEqual([
          '--match-response-lines: "x" is not an integer',
          '--match-response-lines: "2.5" is not an integer',
        ]);
      }
    });
  });

  describe('match config files', () => {
    let files: FileFixture;

    beforeEach(async () => {
      files = await createFileFixture();
    });

    afterEach(async () => {
      await files.cleanup();
    });

    it('loads a valid configuration', async () => {
      const file = await files.write(
        'match.json',
        '{"responseCodes":["500"],"lines":[1]}'
      );
      expect(loadMatchConfig(file)).toEqual({
        responseCodes: ['500'],
        lines: [1],
      });
    });

    it('lets flags win over the file', async () => {
      const file = await files.write(
        'match.json',
        '{"responseCodes":["500"],"lines":[1]}'
      );
      expect(
        resolveMatchOptions({ matchConfig: file, matchResponseCodes: '200' })
      ).toEqual({ responseCodes: ['200'], lines: [1] });
    });

    it('rejects files that are not JSON', async () => {
      const file = await files.write('match.json', '{"lines":');
      expect(() => loadMatchConfig(file)).toThrow(MalformedJsonError);
    });

    it('rejects unknown keys', async () => {
      const file = await files.write('match.json', '{"codes":["200"]}');
      expect(() => loadMatchConfig(file)).toThrow(ConfigurationError);
    });

    it('rejects a missing file', () => {
      expect(() => loadMatchConfig(`${files.dir}/absent.json`)).toThrow(
        /^File not found: /
      );
    });
  });

  it('validates codes given as flags', () => {
    expect(() => resolveMatchOptions({ matchResponseCodes: '1XX' })).toThrow(
      ConfigurationError
    );
  });

  describe('parseResponseCode', () => {
    it('accepts HTTP status codes', () => {
      expect(parseResponseCode('200')).toBe(200);
      expect(parseResponseCode(' 503 ')).toBe(503);
    });

    it.each(['abc', '99', '600', '2000', undefined])('rejects %j', (value) => {
      expect(() => parseResponseCode(value)).toThrow(/Invalid --code value/);
    });
  });

  describe('parseSeed', () => {
    it('accepts integers', () => {
      expect(parseSeed('42')).toBe(42);
      expect(parseSeed('-7')).toBe(-7);
    });

    it('rejects anything else', () => {
      expect(() => parseSeed('1.5')).toThrow(
        'Invalid --seed value "1.5". Expected an integer.'
      );
    });
  });
});
