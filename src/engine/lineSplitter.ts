import { TextDecoder } from 'node:util';

// ESC-prefixed SGR/CSI sequences, and bare `[0;32m` fragments left behind by
// tools that strip the ESC byte themselves.
const ANSI_ESCAPE_PATTERN = /\x1B\[[0-?]*[ -/]*[@-~]|\[[0-9;]+m/g;

export type SplitLine = {
  content: string;
  truncated: boolean;
};

export function stripAnsiCodes(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}

export function isSupportedEncoding(encoding: string): boolean {
  try {
    new TextDecoder(encoding);
    return true;
  } catch {
    return false;
  }
}

/**
 * Incremental byte-to-line splitter shared by every tailer.
 *
 * Holds back the unterminated tail of the last chunk until its newline
 * arrives. A partial line that grows past `maxLineLength` is emitted early,
 * cut and flagged, and the remainder up to the next newline is discarded.
 */
export class LineSplitter {
  private decoder: TextDecoder;
  private partial = '';
  private discarding = false;

  constructor(
    private readonly encoding: string,
    private readonly maxLineLength: number
  ) {
    this.decoder = new TextDecoder(encoding);
  }

  push(chunk: Uint8Array): SplitLine[] {
    const text = this.partial + this.decoder.decode(chunk, { stream: true });
    const pieces = text.split('\n');
    this.partial = pieces.pop() ?? '';

    const lines: SplitLine[] = [];
    for (const piece of pieces) {
      if (this.discarding) {
        this.discarding = false;
        continue;
      }
      this.collect(piece, lines);
    }

    if (this.discarding) {
      this.partial = '';
    } else if (this.partial.length > this.maxLineLength) {
      this.collect(this.partial, lines);
      this.partial = '';
      this.discarding = true;
    }

    return lines;
  }

  /** Emits whatever unterminated text is buffered. */
  flush(): SplitLine[] {
    const rest = this.partial + this.decoder.decode();
    const wasDiscarding = this.discarding;
    this.reset();

    const lines: SplitLine[] = [];
    if (!wasDiscarding) {
      this.collect(rest, lines);
    }
    return lines;
  }

  /**
   * Drops everything up to the next newline. Used when reading starts in the
   * middle of a file, where the first line is almost always cut.
   */
  skipFirstLine(): void {
    this.discarding = true;
  }

  reset(): void {
    this.partial = '';
    this.discarding = false;
    this.decoder = new TextDecoder(this.encoding);
  }

  private collect(raw: string, into: SplitLine[]): void {
    const cleaned = stripAnsiCodes(raw.endsWith('\r') ? raw.slice(0, -1) : raw).trimEnd();
    if (!cleaned.trim()) {
      return;
    }

    if (cleaned.length > this.maxLineLength) {
      into.push({ content: cleaned.slice(0, this.maxLineLength), truncated: true });
      return;
    }

    into.push({ content: cleaned, truncated: false });
  }
}
