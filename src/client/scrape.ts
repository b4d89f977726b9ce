import { ImageNotFoundError, SrcAttributeError, UnterminatedAttributeError } from './errors';

const IMG_TAG_START = '<img id="result-image"';
const SRC_ATTR_START = 'src="';
const SRC_ATTR_END = '"';

/**
 * Pulls the result image URL out of a result page. This is a plain ordered
 * text scan, not an HTML parse: find the tag marker, then the first `src="`
 * after it, then the next quote.
 */
export function extractImageUrl(html: string): string {
  const tagIndex = html.indexOf(IMG_TAG_START);
  if (tagIndex === -1) throw new ImageNotFoundError();

  const srcIndex = html.indexOf(SRC_ATTR_START, tagIndex);
  if (srcIndex === -1) throw new SrcAttributeError();
  const valueStart = srcIndex + SRC_ATTR_START.length;

  const valueEnd = html.indexOf(SRC_ATTR_END, valueStart);
  if (valueEnd === -1) throw new UnterminatedAttributeError();

  return html.slice(valueStart, valueEnd);
}
