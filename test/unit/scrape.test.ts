import { describe, it, expect } from 'vitest';
import { extractImageUrl } from '../../src/client/scrape';
import {
  ImageNotFoundError,
  ResultPageError,
  SrcAttributeError,
  UnterminatedAttributeError,
} from '../../src/client/errors';

describe('extractImageUrl', () => {
  it('returns the src value of the result image', () => {
    const html = '<html><body><img id="result-image" src="https://example.com/image.jpg" alt="Result"></body></html>';
    expect(extractImageUrl(html)).toBe('https://example.com/image.jpg');
  });

  it('returns the value without surrounding quotes or whitespace', () => {
    expect(extractImageUrl('<img id="result-image" src="https://x/y.jpg">')).toBe('https://x/y.jpg');
  });

  it('skips attributes between the marker and src', () => {
    const html = '<img id="result-image" class="big" data-x="1" src="https://cdn.example/r.png" />';
    expect(extractImageUrl(html)).toBe('https://cdn.example/r.png');
  });

  it('ignores src attributes that appear before the marker', () => {
    const html = '<img src="https://example.com/logo.png"><img id="result-image" src="https://example.com/out.jpg">';
    expect(extractImageUrl(html)).toBe('https://example.com/out.jpg');
  });

  it('takes the first src after the marker even if it belongs to a later tag', () => {
    const html = '<img id="result-image" alt="none"><img src="https://example.com/next.jpg">';
    expect(extractImageUrl(html)).toBe('https://example.com/next.jpg');
  });

  it('returns an empty string for an empty src', () => {
    expect(extractImageUrl('<img id="result-image" src="">')).toBe('');
  });

  it('fails with ImageNotFoundError when the marker is missing', () => {
    const html = '<html><body><img id="other-image" src="https://example.com/image.jpg"></body></html>';
    expect(() => extractImageUrl(html)).toThrow(ImageNotFoundError);
  });

  it('does not match a marker with different attribute order', () => {
    expect(() => extractImageUrl('<img src="https://x/y.jpg" id="result-image">')).toThrow(ImageNotFoundError);
  });

  it('fails with SrcAttributeError when no src follows the marker', () => {
    const html = '<html><body><img id="result-image" alt="Result"></body></html>';
    expect(() => extractImageUrl(html)).toThrow(SrcAttributeError);
  });

  it('fails with UnterminatedAttributeError when the src value never closes', () => {
    const html = '<html><body><img id="result-image" src="https://example.com/image.jpg';
    expect(() => extractImageUrl(html)).toThrow(UnterminatedAttributeError);
  });

  it('reports each failure as a distinct result-page error', () => {
    const cases: [string, new () => ResultPageError][] = [
      ['<p>nothing</p>', ImageNotFoundError],
      ['<img id="result-image">', SrcAttributeError],
      ['<img id="result-image" src="abc', UnterminatedAttributeError],
    ];
    for (const [html, ErrorClass] of cases) {
      let caught: unknown;
      try {
        extractImageUrl(html);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ErrorClass);
      expect(caught).toBeInstanceOf(ResultPageError);
      for (const [, other] of cases) {
        if (other !== ErrorClass) expect(caught).not.toBeInstanceOf(other);
      }
    }
  });
});
