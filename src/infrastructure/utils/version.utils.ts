const VERSION_REGEX = /(\d+)\.(\d+)(?:\.(\d+))?/;

/** Extracts [major, minor, patch] from output such as "Python 3.11.4". */
export function parseVersion(output: string): [number, number, number] | null {
  const m = VERSION_REGEX.exec(output);
  if (!m) return null;
  return [Number(m[1]), Number(m[2]), m[3] === undefined ? 0 : Number(m[3])];
}

export function isAtLeast(found: [number, number, number], min: string): boolean {
  const required = parseVersion(min);
  if (!required) return true;
  for (let i = 0; i < 3; i++) {
    if (found[i] > required[i]) return true;
    if (found[i] < required[i]) return false;
  }
  return true;
}
