import { describe, it, expect } from 'vitest';
import { describeBodyForLog, errorToLog, sanitizeHeadersForLog, truncateString } from '../logging.js';
import { EncodingError, MalformedPartsError } from '../../errors/index.js';
import { HttpError } from '../../http/errors.js';

describe('Logging Utilities', () => {
  describe('truncateString', () => {
    it('should return string unchanged if below max length', () => {
      expect(truncateString('hello world', 50)).toBe('hello world');
    });

    it('should truncate string at max length with ellipsis', () => {
      expect(truncateString('this is a very long string', 10)).toBe('this is a ...');
    });

    it('should use default max length of 500', () => {
      expect(truncateString('a'.repeat(600)).length).toBe(503);
    });
  });

  describe('sanitizeHeadersForLog', () => {
    it('should return undefined if input is undefined', () => {
      expect(sanitizeHeadersForLog(undefined)).toBeUndefined();
    });

    it('should mask credentials regardless of case', () => {
      expect(
        sanitizeHeadersForLog({
          Authorization: 'Bearer test-token',
          'X-API-Key': 'abc',
          Cookie: 'session=1',
          'content-type': 'application/json',
          'content-length': 12,
        })
      ).toEqual({
        Authorization: 'REDACTED',
        'X-API-Key': 'REDACTED',
        Cookie: 'REDACTED',
        'content-type': 'application/json',
        'content-length': '12',
      });
    });
  });

  describe('describeBodyForLog', () => {
    it('describes empty and raw bodies', () => {
      expect(describeBodyForLog({ type: 'none' }, true)).toEqual({ bodyType: 'none' });
      expect(describeBodyForLog({ type: 'raw', payload: 'name=value' }, false)).toEqual({ bodyType: 'raw', bodyLength: 10 });
      expect(describeBodyForLog({ type: 'raw', payload: 'name=value' }, true)).toEqual({
        bodyType: 'raw',
        bodyLength: 10,
        body: 'name=value',
      });
    });

    it('lists multipart parts without their contents', () => {
      expect(
        describeBodyForLog({ type: 'multipart', parts: [['title', 'Report'], ['file', 'a.txt', { content: 'secret' }, []]] }, true)
      ).toEqual({ bodyType: 'multipart', parts: ['field:title', 'file:a.txt'] });
    });
  });

  describe('errorToLog', () => {
    it('keeps category and cause of request errors', () => {
      const error = new EncodingError('Unable to encode JSON body: boom', { cause: new TypeError('boom') });
      expect(errorToLog(error)).toEqual({
        type: 'EncodingError',
        message: 'Unable to encode JSON body: boom',
        category: 'Encoding',
        cause: 'boom',
      });
    });

    it('counts malformed parts', () => {
      const error = new MalformedPartsError([{ value: 1, guidance: 'g' }, { value: 2, guidance: 'g' }]);
      expect(errorToLog(error)).toMatchObject({ category: 'MalformedParts', invalidParts: 2 });
    });

    it('keeps the status of HTTP errors', () => {
      expect(errorToLog(new HttpError('404 Not Found', { status: 404 }))).toEqual({
        type: 'HttpError',
        message: '404 Not Found',
        status: 404,
      });
    });

    it('handles non-error values', () => {
      expect(errorToLog('plain')).toEqual({ type: 'string', message: 'plain' });
    });
  });
});
