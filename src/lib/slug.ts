import anyAscii from 'any-ascii';

const PUNCTUATION = /[\t !"#$%&'()*\-/<=>?@[\\\]^_`{|},.]+/;

/**
 * Generates an ASCII-only slug.
 *
 * The text is lowercased and split on punctuation runs; each piece is
 * transliterated and split again on whitespace. Anything the transliteration
 * leaves outside `[a-z0-9]` also separates words, so the result always
 * matches `^[a-z0-9-]*$`.
 *
 * @example
 * slugify('Café del Mar, Vol. 2') // 'cafe-del-mar-vol-2'
 */
export function slugify(text: string, delimiter: string = '-'): string {
  const words: string[] = [];

  for (const piece of text.toLowerCase().split(PUNCTUATION)) {
    const ascii = anyAscii(piece).toLowerCase();
    for (const word of ascii.split(/[^a-z0-9]+/)) {
      if (word) words.push(word);
    }
  }

  return words.join(delimiter);
}

/**
 * Reduces a client-supplied filename to something safe to display.
 * Never used to build storage paths.
 */
export function sanitizeFilename(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  return anyAscii(base)
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/^[.]+/, '');
}

/**
 * Lowercased extension without the leading dot, or '' when there is none
 */
export function extensionOf(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) return '';
  return base.slice(dot + 1).toLowerCase();
}
