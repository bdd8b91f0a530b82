/**
 * Turn a plasmid name into a directory/file name component.
 *
 * Path-hostile characters and "%" itself are percent-encoded, so the mapping is
 * reversible and "a/b" never lands on the same path as "a%2Fb" or "a_b".
 * A few common lab symbols are spelled out between "%" markers ("5μg" becomes
 * "5%u%g", never "5ug"); any other non-ASCII character is percent-encoded as
 * UTF-8. A byte escape is "%" plus two uppercase hex digits and no spelling
 * starts with two of those, so every output decodes one way only.
 */
import { join } from 'node:path';

/** Characters that are not allowed (or not portable) in a path component. */
const DISALLOWED = /^[<>:"/\\|?*%\u0000-\u001f\u007f]$/;

/** Symbol → spelling. Spellings are distinct and never contain "%". */
export const SYMBOL_SUBSTITUTES: Readonly<Record<string, string>> = {
  μ: 'u',
  '°': 'deg',
  α: 'alpha',
  β: 'beta',
  γ: 'gamma',
  Δ: 'Delta',
  δ: 'delta',
  '±': '+-',
  '×': 'x',
  '′': "'",
  '″': "''",
};

function percentEncode(char: string): string {
  return [...Buffer.from(char, 'utf8')]
    .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`)
    .join('');
}

export function toSafeFileName(name: string): string {
  if (name.length === 0) {
    throw new RangeError('Cannot build a file name from an empty name');
  }

  let safe = '';
  for (const char of name) {
    const substitute = SYMBOL_SUBSTITUTES[char];
    if (substitute !== undefined) {
      safe += `%${substitute}%`;
    } else if (DISALLOWED.test(char) || char > '~') {
      safe += percentEncode(char);
    } else {
      safe += char;
    }
  }

  if (/^\.+$/.test(safe)) {
    // "." and ".." are not usable names
    return safe.replace(/\./g, '%2E');
  }

  // Windows drops trailing dots and spaces
  return safe.replace(/[. ]+$/, (tail) => tail.replace(/\./g, '%2E').replace(/ /g, '%20'));
}

/**
 * Where a file-based sink puts one record: {root}/plasmids/{safe}/{safe}.{extension}
 */
export function recordFilePath(root: string, name: string, extension: string): string {
  const safe = toSafeFileName(name);
  return join(root, 'plasmids', safe, `${safe}.${extension}`);
}
