export function parseFloatSafe(s: string): number | null {
  const t = s.trim();
  if (!t) return null;
  const v = Number(t);
  return Number.isFinite(v) ? v : null;
}

export function parseIntSafe(s: string): number | null {
  const t = s.trim();
  if (!t) return null;
  const v = parseInt(t, 10);
  return Number.isFinite(v) ? v : null;
}

// 0-based, end-exclusive; short lines yield an empty or truncated field.
export function slice(line: string, start: number, end: number): string {
  return line.length > start ? line.substring(start, Math.min(end, line.length)) : "";
}

/** Single-pass line scanner; strips a trailing CR and reports 1-based line numbers. */
export function forEachLine(text: string, visit: (line: string, lineNum: number) => void): void {
  let lineNum = 0;
  for (let i = 0, n = text.length; i <= n; ) {
    let j = text.indexOf("\n", i);
    if (j === -1) j = n;
    let line = text.substring(i, j);
    if (line.endsWith("\r")) line = line.slice(0, -1);
    i = j + 1;
    lineNum++;
    visit(line, lineNum);
  }
}
