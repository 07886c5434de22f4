/** Code-unit order, independent of locale. Used wherever ids break ties. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
