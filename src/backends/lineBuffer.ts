/**
 * Accumulates decoded text and hands back complete, non-blank lines.
 * A trailing partial line is held until more text or flush() arrives.
 */
export class LineBuffer {
  private pending = '';

  push(text: string): string[] {
    this.pending += text;
    const lines = this.pending.split('\n');
    this.pending = lines.pop() ?? '';
    return clean(lines);
  }

  flush(text = ''): string[] {
    const rest = this.pending + text;
    this.pending = '';
    return clean(rest.split('\n'));
  }
}

function clean(lines: string[]): string[] {
  const out: string[] = [];
  for (const line of lines) {
    const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line;
    if (trimmed.trim() !== '') out.push(trimmed);
  }
  return out;
}
