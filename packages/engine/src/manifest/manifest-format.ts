/**
 * hpikit Engine: Manifest Text Format
 *
 * Reads and writes the main section of a jar manifest (`META-INF/MANIFEST.MF`).
 *
 * Format rules:
 * - one `Name: value` header per line, lines terminated by CRLF
 * - no line longer than 72 bytes (UTF-8); longer headers continue on the
 *   next line, which starts with a single space
 * - the main section ends with an empty line
 * - header names are case-insensitive
 */

/**
 * Ordered manifest attributes. Every value is a plain string so it can be
 * written verbatim and fingerprinted.
 */
export type ManifestAttributes = ReadonlyArray<readonly [name: string, value: string]>;

const MAX_LINE_BYTES = 72;
const CRLF = '\r\n';
const encoder = new TextEncoder();

function byteLength(text: string): number {
  return encoder.encode(text).length;
}

/**
 * Split a header into manifest lines without breaking a multi-byte
 * character across lines.
 */
function wrapHeader(header: string): string[] {
  const lines: string[] = [];
  let current = '';
  let limit = MAX_LINE_BYTES;
  for (const char of header) {
    if (byteLength(current) + byteLength(char) > limit) {
      lines.push(current);
      current = ' ';
      limit = MAX_LINE_BYTES;
    }
    current += char;
  }
  lines.push(current);
  return lines;
}

/**
 * Render attributes as manifest text. `Manifest-Version: 1.0` is written
 * first, whether or not the attributes carry it.
 */
export function renderManifest(attributes: ManifestAttributes): string {
  const version = attributes.find(([name]) => sameName(name, 'Manifest-Version'));
  const ordered: ManifestAttributes = [
    ['Manifest-Version', version?.[1] ?? '1.0'],
    ...attributes.filter(([name]) => !sameName(name, 'Manifest-Version')),
  ];
  const lines = ordered.flatMap(([name, value]) => wrapHeader(`${name}: ${value}`));
  return lines.join(CRLF) + CRLF + CRLF;
}

/**
 * Parse the main section of manifest text. Individual sections (after the
 * first empty line) are ignored.
 */
export function parseManifest(text: string): ManifestAttributes {
  const headers: string[] = [];
  for (const line of text.split(/\r\n|\n|\r/)) {
    if (line === '') {
      if (headers.length > 0) break;
      continue;
    }
    const previous = headers.at(-1);
    if (line.startsWith(' ') && previous !== undefined) {
      headers[headers.length - 1] = previous + line.slice(1);
      continue;
    }
    headers.push(line);
  }

  const attributes: Array<readonly [string, string]> = [];
  for (const header of headers) {
    const separator = header.indexOf(': ');
    if (separator <= 0) continue;
    attributes.push([header.slice(0, separator), header.slice(separator + 2)]);
  }
  return attributes;
}

/**
 * Merge `incoming` into `existing`. Existing attributes keep their position;
 * a clashing name takes the incoming value; new names are appended in
 * incoming order.
 */
export function mergeAttributes(
  existing: ManifestAttributes,
  incoming: ManifestAttributes,
): ManifestAttributes {
  const result: Array<readonly [string, string]> = existing.map(([n, v]) => [n, v] as const);
  for (const [name, value] of incoming) {
    const index = result.findIndex(([n]) => sameName(n, name));
    if (index >= 0) {
      result[index] = [name, value];
    } else {
      result.push([name, value]);
    }
  }
  return result;
}

export function getAttribute(attributes: ManifestAttributes, name: string): string | undefined {
  return attributes.find(([n]) => sameName(n, name))?.[1];
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
