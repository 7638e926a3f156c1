/**
 * NDJSON Line Buffer
 *
 * Accumulates raw stream data and emits complete lines. Handles partial
 * lines across `data` events.
 *
 * Protocol: JSON.stringify escapes internal newlines, so raw \n is an
 * unambiguous message delimiter. A trailing \r is dropped so CRLF input
 * decodes the same.
 */

export class LineBuffer {
  private buffer = "";

  /** Feed raw data, returns array of complete lines */
  feed(chunk: string): string[] {
    this.buffer += chunk;
    const lines: string[] = [];
    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf("\n")) !== -1) {
      const line = stripCarriageReturn(this.buffer.slice(0, newlineIndex));
      this.buffer = this.buffer.slice(newlineIndex + 1);
      if (line.length > 0) {
        lines.push(line);
      }
    }
    return lines;
  }

  /** Drain the unterminated remainder at end of input */
  flush(): string[] {
    const rest = stripCarriageReturn(this.buffer);
    this.buffer = "";
    return rest.length > 0 ? [rest] : [];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
