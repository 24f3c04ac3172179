import { EmitterClosedError, InvalidIndentStateError } from '../errors/index.js';

/**
 * Anything that accepts text: `process.stdout`, a file write stream,
 * or a {@link StringSink}.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * In-memory sink. Lets callers render a whole document before
 * handing it to a file or stdout.
 */
export class StringSink implements TextSink {
  private chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  toString(): string {
    return this.chunks.join('');
  }
}

export const DEFAULT_TABSTYLE = '  ';

/**
 * Indentation-aware writer over a {@link TextSink}.
 */
export class TextEmitter {
  private sink: TextSink | undefined;
  private level = 0;

  constructor(
    sink: TextSink,
    private readonly tabstyle: string = DEFAULT_TABSTYLE,
  ) {
    this.sink = sink;
  }

  get depth(): number {
    return this.level;
  }

  get closed(): boolean {
    return this.sink === undefined;
  }

  write(text: string): void {
    this.emit(this.tabstyle.repeat(this.level) + text);
  }

  /**
   * Write one indented line. Without `text` a bare newline is written,
   * so blank separator lines carry no trailing whitespace.
   */
  writeln(text?: string): void {
    if (text === undefined || text === '') {
      this.emit('\n');
      return;
    }
    this.emit(this.tabstyle.repeat(this.level) + text + '\n');
  }

  indent(): void {
    this.level++;
  }

  dedent(): void {
    if (this.level === 0) {
      throw new InvalidIndentStateError();
    }
    this.level--;
  }

  /**
   * Run `body` one level deeper. The level is restored on every exit path.
   */
  indented<T>(body: () => T): T {
    this.indent();
    try {
      return body();
    } finally {
      this.dedent();
    }
  }

  /** Release the sink. Writing afterwards throws {@link EmitterClosedError}. */
  close(): void {
    this.sink = undefined;
  }

  private emit(text: string): void {
    if (!this.sink) {
      throw new EmitterClosedError();
    }
    this.sink.write(text);
  }
}

/**
 * Scoped emitter acquisition: the emitter is closed once `body` returns
 * or throws.
 */
export function withEmitter<T>(
  sink: TextSink,
  body: (emitter: TextEmitter) => T,
  tabstyle: string = DEFAULT_TABSTYLE,
): T {
  const emitter = new TextEmitter(sink, tabstyle);
  try {
    return body(emitter);
  } finally {
    emitter.close();
  }
}
