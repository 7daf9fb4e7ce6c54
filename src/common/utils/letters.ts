/**
 * Spreadsheet-style labels: 0 -> A, 25 -> Z, 26 -> AA.
 */
export function letterLabel(index: number): string {
  let label = '';
  let n = index;
  do {
    label = String.fromCharCode(65 + (n % 26)) + label;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return label;
}
