/** Unit convention for `K`/`M`/`G`… suffixes. */
export type SizeUnits = 'binary' | 'decimal';

const UNIT_SYMBOLS = 'BKMGTPEZY';

/** Whole-string size: `482`, `1,234`, `1.5K`, `12 MB`, `3 KiB`, `20 bytes`. */
const SIZE_PATTERN = /^(\d[\d,]*(?:\.\d+)?)\s?([BKMGTPEZY])?(?:i?B|bytes?)?$/i;

/** Size token at the start of a `<pre>` line, or a lone `-`. */
const SIZE_TOKEN = /^(?:-|(\d[\d,]*(?:\.\d+)?) ?([BKMGTPEZY])?(?:i?B)?)(?=\s|$)/i;

/**
 * Converts a size label into a byte count.
 *
 * `-`, empty text and anything unparseable give `null`.
 */
export function parseSize(text: string, units: SizeUnits = 'binary'): number | null {
  const value = text.trim();
  if (!value || value === '-') {return null;}

  const match = SIZE_PATTERN.exec(value);
  if (!match) {return null;}
  return toBytes(match[1], match[2], units);
}

/** True for text a size column would hold, including the `-` placeholder. */
export function isSizeLike(text: string): boolean {
  const value = text.trim();
  return value === '-' || SIZE_PATTERN.test(value);
}

/**
 * Reads a size token from the start of `line`.
 *
 * @returns The parsed size and the text after the token,
 *          or `null` when the line does not start with a size.
 */
export function readSizeToken(
  line: string,
  units: SizeUnits = 'binary',
): { size: number | null; rest: string } | null {
  const match = SIZE_TOKEN.exec(line);
  if (!match) {return null;}

  const rest = line.slice(match[0].length);
  if (match[1] === undefined) {return { size: null, rest };}
  return { size: toBytes(match[1], match[2], units), rest };
}

function toBytes(digits: string, unit: string | undefined, units: SizeUnits): number | null {
  const amount = Number(digits.replace(/,/g, ''));
  if (!Number.isFinite(amount)) {return null;}

  const exponent = unit ? UNIT_SYMBOLS.indexOf(unit.toUpperCase()) : 0;
  const base = units === 'decimal' ? 1000 : 1024;
  return Math.round(amount * base ** exponent);
}
