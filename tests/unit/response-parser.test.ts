import { describe, it, expect } from 'vitest';
import {
  RESPONSE_TEXT_KEYS,
  extractResponseText,
  parseResponseBody,
} from '../../src/processing/response-parser.js';

describe('extractResponseText', () => {
  it('probes keys in a fixed order', () => {
    expect(RESPONSE_TEXT_KEYS).toEqual(['summary', 'summarization', 'result', 'output', 'text', 'content']);
    expect(extractResponseText({ content: 'C', result: 'R', summary: 'S' })).toBe('S');
    expect(extractResponseText({ content: 'C', text: 'T' })).toBe('T');
  });

  it('skips blank strings', () => {
    expect(extractResponseText({ summary: '   ', result: 'R' })).toBe('R');
    expect(extractResponseText({ summary: '', summarization: '\n', output: 'O' })).toBe('O');
  });

  it('stops at a present key holding null', () => {
    expect(extractResponseText({ summary: null, output: 'O' })).toBe('null');
    expect(extractResponseText({ content: 'C', text: null })).toBe('null');
  });

  it('serializes structured values found under a key', () => {
    expect(extractResponseText({ result: { a: 1 } })).toBe('{\n  "a": 1\n}');
    expect(extractResponseText({ output: ['x'] })).toBe('[\n  "x"\n]');
  });

  it('stringifies scalars found under a key', () => {
    expect(extractResponseText({ output: 42 })).toBe('42');
    expect(extractResponseText({ content: false })).toBe('false');
  });

  it('returns the whole object when no known key has a value', () => {
    expect(extractResponseText({ other: 'x' })).toBe('{\n  "other": "x"\n}');
    expect(extractResponseText({ summary: '' })).toBe('{\n  "summary": ""\n}');
  });

  it('treats an empty object as no content', () => {
    expect(extractResponseText({})).toBeNull();
  });

  it('returns non-blank strings verbatim', () => {
    expect(extractResponseText('  plain text  ')).toBe('  plain text  ');
    expect(extractResponseText(' \n ')).toBeNull();
  });

  it('treats null and undefined as no content', () => {
    expect(extractResponseText(null)).toBeNull();
    expect(extractResponseText(undefined)).toBeNull();
  });

  it('stringifies other values', () => {
    expect(extractResponseText([])).toBe('[]');
    expect(extractResponseText([1, 2])).toBe('[\n  1,\n  2\n]');
    expect(extractResponseText(7)).toBe('7');
  });
});

describe('parseResponseBody', () => {
  it('parses JSON bodies', () => {
    expect(parseResponseBody('{"summary":"done"}')).toEqual({ summary: 'done' });
    expect(parseResponseBody('"quoted"')).toBe('quoted');
  });

  it('keeps non-JSON bodies as text', () => {
    expect(parseResponseBody('not json')).toBe('not json');
    expect(parseResponseBody('')).toBe('');
  });
});
