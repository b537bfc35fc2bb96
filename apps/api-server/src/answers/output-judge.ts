/**
 * Canonical form used to compare program outputs: `\r\n` and `\r` become
 * `\n`, trailing whitespace is dropped from every line and from the end of
 * the text. Leading whitespace is significant.
 */
export function normalizeOutput(output: string): string {
  return output
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trimEnd();
}

export function outputsMatch(actual: string, expected: string): boolean {
  return normalizeOutput(actual) === normalizeOutput(expected);
}
