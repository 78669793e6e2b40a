/** Last `count` lines of a response body, trailing blank lines dropped. */
export function tailLines(text: string, count = 13): string[] {
  const lines = text.replace(/\s+$/, "").split(/\r?\n/);
  return lines.slice(Math.max(lines.length - count, 0));
}
