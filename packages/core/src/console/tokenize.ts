/** Split a console line on runs of whitespace. Blank lines yield no tokens. */
export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}
