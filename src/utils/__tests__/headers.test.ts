import { describe, it, expect } from 'vitest';
import { flattenHeaders, removeHeader, replaceHeader } from '../headers.js';

describe('header helpers', () => {
  it('replaces every case-variant of a header', () => {
    const headers: Record<string, string> = { 'content-type': 'text/plain', 'CONTENT-TYPE': 'text/html', accept: '*/*' };
    replaceHeader(headers, 'Content-Type', 'application/json');

    expect(headers).toEqual({ accept: '*/*', 'Content-Type': 'application/json' });
  });

  it('removes a header regardless of case', () => {
    const headers: Record<string, string> = { 'Accept-Encoding': 'gzip' };
    removeHeader(headers, 'accept-encoding');

    expect(headers).toEqual({});
  });

  it('joins repeated headers', () => {
    expect(flattenHeaders({ 'set-cookie': ['a=1', 'b=2'], 'content-type': 'application/json', age: undefined })).toEqual({
      'set-cookie': 'a=1, b=2',
      'content-type': 'application/json'
    });
  });
});
