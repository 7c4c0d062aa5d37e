/**
 * Splits a byte stream into lines
 *
 * Bytes are decoded as latin1, so each octet becomes exactly one code unit
 * and 8-bit message bodies pass through unchanged.
 */

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
  timeoutId?: NodeJS.Timeout;
}

/**
 * Buffers incoming chunks and hands out complete lines one read at a time.
 * Lines end with CRLF or a bare LF; the terminator is not part of the line.
 */
export class LineReader {
  private buffer: string = '';
  private lines: string[] = [];
  private ended: boolean = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;

  /**
   * Number of complete lines waiting to be read
   */
  get bufferedLines(): number {
    return this.lines.length;
  }

  /**
   * Whether the stream has ended or failed
   */
  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Feed a chunk received from the stream
   */
  push(chunk: Buffer | string): void {
    if (this.ended) return;

    this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('latin1');

    let lineEnd: number;
    while ((lineEnd = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, lineEnd);
      this.buffer = this.buffer.slice(lineEnd + 1);
      this.lines.push(line.endsWith('\r') ? line.slice(0, -1) : line);
    }

    this.flush();
  }

  /**
   * Mark the end of the stream. An unterminated trailing fragment is not a
   * line and is discarded.
   */
  end(): void {
    if (this.ended) return;

    this.buffer = '';
    this.ended = true;
    this.flush();
  }

  /**
   * Fail the stream: the pending read and every later read reject with error
   */
  fail(error: Error): void {
    if (this.failure) return;

    this.failure = error;
    this.ended = true;
    this.flush();
  }

  /**
   * Read the next line
   *
   * @param timeoutMs - Reject if no line arrives in time (0 disables)
   * @param onTimeout - Builds the rejection error on timeout
   * @returns The line, or null at end of stream
   */
  read(timeoutMs: number = 0, onTimeout?: () => Error): Promise<string | null> {
    if (this.pending) {
      return Promise.reject(new Error('A line read is already pending'));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      const pending: PendingRead = { resolve, reject };

      if (timeoutMs > 0) {
        pending.timeoutId = setTimeout(() => {
          this.pending = null;
          reject(onTimeout ? onTimeout() : new Error(`No line received within ${timeoutMs}ms`));
        }, timeoutMs);
      }

      this.pending = pending;
    });
  }

  /**
   * Settle the pending read if there is something to settle it with
   */
  private flush(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.failure) {
      this.settle(pending);
      pending.reject(this.failure);
      return;
    }

    const line = this.lines.shift();
    if (line !== undefined) {
      this.settle(pending);
      pending.resolve(line);
    } else if (this.ended) {
      this.settle(pending);
      pending.resolve(null);
    }
  }

  private settle(pending: PendingRead): void {
    if (pending.timeoutId) {
      clearTimeout(pending.timeoutId);
    }
    this.pending = null;
  }
}
