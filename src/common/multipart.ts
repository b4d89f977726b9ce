// multipart/form-data encoding with a caller-chosen boundary.
// The remote service expects browser-style WebKit boundaries, so FormData's
// generated boundary can't be used.

const CRLF = '\r\n';

function escapeQuotes(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export class MultipartWriter {
  private parts: Buffer[] = [];
  private closed = false;

  constructor(readonly boundary: string) {
    if (!/^[0-9A-Za-z'()+_,\-./:=?]{1,70}$/.test(boundary)) {
      throw new Error(`Invalid multipart boundary: ${boundary}`);
    }
  }

  get contentType(): string {
    return `multipart/form-data; boundary=${this.boundary}`;
  }

  writeField(name: string, value: string): this {
    return this.writePart([`Content-Disposition: form-data; name="${escapeQuotes(name)}"`], Buffer.from(value, 'utf8'));
  }

  writeFile(name: string, filename: string, data: Uint8Array, contentType = 'application/octet-stream'): this {
    return this.writePart(
      [
        `Content-Disposition: form-data; name="${escapeQuotes(name)}"; filename="${escapeQuotes(filename)}"`,
        `Content-Type: ${contentType}`,
      ],
      data
    );
  }

  /**
   * Appends the closing delimiter and returns the encoded body. The writer
   * can't be used afterwards.
   */
  finish(): Buffer {
    if (!this.closed) {
      this.parts.push(Buffer.from(`--${this.boundary}--${CRLF}`, 'utf8'));
      this.closed = true;
    }
    return Buffer.concat(this.parts);
  }

  private writePart(headers: string[], content: Uint8Array): this {
    if (this.closed) throw new Error('MultipartWriter already finished');
    const head = `--${this.boundary}${CRLF}${headers.join(CRLF)}${CRLF}${CRLF}`;
    this.parts.push(Buffer.from(head, 'utf8'), Buffer.from(content), Buffer.from(CRLF, 'utf8'));
    return this;
  }
}

export function encodeFormFields(boundary: string, fields: Record<string, string>): Buffer {
  const writer = new MultipartWriter(boundary);
  for (const [name, value] of Object.entries(fields)) writer.writeField(name, value);
  return writer.finish();
}
