/**
 * Length in Unicode code points, the unit Postgres VARCHAR limits count.
 * `String#length` counts UTF-16 units, so an emoji would count twice.
 */
export function countCharacters(text: string): number {
  return [...text].length;
}

export function isWithinLength(text: string, min: number, max: number): boolean {
  const length = countCharacters(text);
  return length >= min && length <= max;
}
