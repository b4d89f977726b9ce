import { describe, it, expect } from 'vitest';
import { parseUploadResponse } from '../../src/client/uploadResponse';
import { UPLOAD_JSON } from '../helpers/fakeService';

describe('parseUploadResponse', () => {
  it('decodes a full upload reply', () => {
    const parsed = parseUploadResponse(UPLOAD_JSON);

    expect(parsed.response.key).toBe('abc123');
    expect(parsed.response.lifetime).toBe(3600);
    expect(parsed.response.image?.highres).toEqual({ url: 'https://img.example/h.jpg', width: 961, height: 1093 });
    expect(parsed.response.sid).toBe('sid-1');
  });

  it('drops fields it does not know', () => {
    const parsed = parseUploadResponse(UPLOAD_JSON);
    expect(parsed.response).not.toHaveProperty('uploadedBy');
  });

  it('accepts a reply carrying only the key', () => {
    expect(parseUploadResponse('{"response":{"key":"k1"}}').response.key).toBe('k1');
  });

  it('accepts null metadata', () => {
    const parsed = parseUploadResponse(
      '{"response":{"key":"abc123","sid":null,"image":null,"expiry":null,"server":null,"existed":null}}'
    );

    expect(parsed.response.key).toBe('abc123');
    expect(parsed.response.image).toBeNull();
    expect(parsed.response.sid).toBeNull();
  });

  it('accepts null image variants', () => {
    const parsed = parseUploadResponse('{"response":{"key":"k2","image":{"highres":null,"thumb":null}}}');
    expect(parsed.response.image).toEqual({ highres: null, thumb: null });
  });

  it('keeps an empty key for the caller to reject', () => {
    expect(parseUploadResponse('{"response":{"key":""}}').response.key).toBe('');
  });

  it('throws on invalid JSON', () => {
    expect(() => parseUploadResponse('invalid json')).toThrow(SyntaxError);
  });

  it('throws when the key is missing or not a string', () => {
    expect(() => parseUploadResponse('{"response":{}}')).toThrow();
    expect(() => parseUploadResponse('{"response":{"key":42}}')).toThrow();
    expect(() => parseUploadResponse('{}')).toThrow();
  });
});
