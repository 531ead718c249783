/**
 * Split text into lines, keeping each line's terminator ("\n" or "\r\n") so
 * joinLines(splitLines(text)) === text.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function joinLines(lines: readonly string[]): string {
  return lines.join("");
}
