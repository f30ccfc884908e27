import { describe, it, expect } from 'vitest';
import { HttpResponse } from '../../src/core/response.js';

const url = 'https://files.example.test/exports/report%20final.pdf';

function response(headers: Record<string, string> = {}, status = 200): HttpResponse {
  return new HttpResponse({ url, status, headers });
}

describe('HttpResponse', () => {
  it('should fill the status text from the status code', () => {
    expect(response({}, 404).statusText).toBe('Not Found');
    expect(new HttpResponse({ url, status: 200, statusText: 'Fine' }).statusText).toBe('Fine');
  });

  it('should tell success statuses apart', () => {
    expect(response({}, 204).ok).toBe(true);
    expect(response({}, 304).ok).toBe(false);
  });

  describe('content type', () => {
    it('should expose the lowercased media type', () => {
      expect(response({ 'content-type': 'Application/JSON; charset=UTF-8' }).mimeType).toBe('application/json');
      expect(response().mimeType).toBeUndefined();
    });

    it('should expose the normalized charset', () => {
      expect(response({ 'content-type': 'text/plain; charset="UTF8"' }).textEncodingName).toBe('utf-8');
      expect(response({ 'content-type': 'text/plain' }).textEncodingName).toBeUndefined();
    });
  });

  describe('expectedContentLength', () => {
    it('should parse Content-Length', () => {
      expect(response({ 'content-length': '42' }).expectedContentLength).toBe(42);
    });

    it('should be -1 when absent or invalid', () => {
      expect(response().expectedContentLength).toBe(-1);
      expect(response({ 'content-length': 'lots' }).expectedContentLength).toBe(-1);
    });
  });

  describe('suggestedFilename', () => {
    it('should prefer the extended Content-Disposition name', () => {
      const disposition = `attachment; filename="plain.txt"; filename*=UTF-8''r%C3%A9sum%C3%A9.txt`;

      expect(response({ 'content-disposition': disposition }).suggestedFilename).toBe('résumé.txt');
    });

    it('should use the plain Content-Disposition name', () => {
      expect(response({ 'content-disposition': 'attachment; filename="data.csv"' }).suggestedFilename).toBe('data.csv');
    });

    it('should strip directories from the suggested name', () => {
      expect(response({ 'content-disposition': 'attachment; filename="../../etc/passwd"' }).suggestedFilename).toBe('passwd');
    });

    it('should fall back to the last path segment', () => {
      expect(response().suggestedFilename).toBe('report final.pdf');
      expect(new HttpResponse({ url: 'https://files.example.test/', status: 200 }).suggestedFilename).toBe('download');
    });
  });
});
