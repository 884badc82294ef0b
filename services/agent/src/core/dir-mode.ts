/**
 * Mode for directories created to hold a file with `fileMode`: every class
 * (owner, group, other) that has any bit in the file mode gets those bits
 * plus execute, so it can traverse the directory. Other classes get nothing.
 *
 *   0o600 -> 0o700, 0o644 -> 0o755, 0o640 -> 0o750
 */
export function dirMode(fileMode: number): number {
  let result = 0;
  for (let execute = 0o1; execute <= 0o100; execute *= 0o10) {
    const mask = 0o7 * execute;
    if ((fileMode & mask) !== 0) {
      result |= (fileMode & mask) | execute;
    }
  }
  return result;
}
