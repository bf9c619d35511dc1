/**
 * Spreadsheet column letters
 */

/**
 * 0-based column index to its letter name (0 -> A, 26 -> AA)
 */
export function columnLetter(index: number): string {
  let name = '';
  let n = index + 1;

  while (n > 0) {
    const remainder = (n - 1) % 26;
    name = String.fromCharCode(65 + remainder) + name;
    n = Math.floor((n - 1) / 26);
  }

  return name;
}

/**
 * Letter name to 0-based column index, or null if the text is not a
 * column letter
 */
export function columnIndexFromLetter(letters: string): number | null {
  const upper = letters.trim().toUpperCase();
  if (!/^[A-Z]{1,3}$/.test(upper)) {
    return null;
  }

  let n = 0;
  for (const ch of upper) {
    n = n * 26 + (ch.charCodeAt(0) - 64);
  }
  return n - 1;
}
