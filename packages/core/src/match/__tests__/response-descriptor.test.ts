import { describe, it, expect } from 'vitest';
import {
  countLines,
  countWords,
  describeResponse,
} from '../response-descriptor';

describe('describeResponse', () => {
  it('derives counts from the body', () => {
    const response = describeResponse({
      responseCode: 500,
      body: 'line one\nline two\r\nthree',
    });
    expect(response).toEqual({
      responseCode: 500,
      body: 'line one\nline two\r\nthree',
      numberOfLines: 3,
      numberOfWords: 5,
      contentLengthInBytes: 24,
    });
    expect(Object.isFrozen(response)).toBe(true);
  });

  it('treats a missing body as empty', () => {
    expect(describeResponse({ responseCode: 204, body: null })).toEqual({
      responseCode: 204,
      body: '',
      numberOfLines: 0,
      numberOfWords: 0,
      contentLengthInBytes: 0,
    });
  });

  it('counts UTF-8 bytes', () => {
    const response = describeResponse({ responseCode: 200, body: 'é' });
    expect(response.contentLengthInBytes).toBe(2);
  });
});

describe('counters', () => {
  it('counts lines', () => {
    expect(countLines('')).toBe(0);
    expect(countLines('one')).toBe(1);
    expect(countLines('one\n')).toBe(1);
    expect(countLines('one\r\ntwo\r\n')).toBe(2);
    expect(countLines('one\rtwo')).toBe(2);
    expect(countLines('\n')).toBe(1);
    expect(countLines('one\n\n')).toBe(2);
  });

  it('counts words across any whitespace', () => {
    expect(countWords('   ')).toBe(0);
    expect(countWords(' a\tb\n c ')).toBe(3);
  });
});
