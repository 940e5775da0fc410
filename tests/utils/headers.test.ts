import { describe, it, expect } from 'vitest';
import { getHeader, hasHeader, mergeHeaders, omitHeaders } from '../../src/utils/headers.js';

describe('headers', () => {
  it('getHeader — 大文字小文字を区別しない', () => {
    const headers = { 'Content-Type': 'text/html' };
    expect(getHeader(headers, 'content-type')).toBe('text/html');
    expect(getHeader(headers, 'accept')).toBeUndefined();
    expect(getHeader(null, 'accept')).toBeUndefined();
    expect(hasHeader(headers, 'CONTENT-TYPE')).toBe(true);
  });

  it('mergeHeaders — 同名は元の位置で置き換え、新規は末尾に追加する', () => {
    const merged = mergeHeaders(
      { Accept: '*/*', 'User-Agent': 'ua', Cookie: 'a=1' },
      { 'user-agent': 'replay', 'X-New': '1' },
    );
    expect(Object.entries(merged)).toEqual([
      ['Accept', '*/*'],
      ['user-agent', 'replay'],
      ['Cookie', 'a=1'],
      ['X-New', '1'],
    ]);
  });

  it('omitHeaders — 名前で除外する', () => {
    expect(omitHeaders({ Host: 'a', 'content-length': '3', Accept: '*/*' }, ['host', 'Content-Length'])).toEqual({
      Accept: '*/*',
    });
  });
});
