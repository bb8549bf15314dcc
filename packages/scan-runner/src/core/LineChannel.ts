/**
 * Turns a stream of text chunks into batches of complete lines.
 *
 * Writers push raw chunks as they arrive; the reader pulls whatever complete
 * lines are buffered, or waits for the next ones. A line is complete once its
 * newline arrived, or when the channel ends.
 */

export const END_OF_STREAM: unique symbol = Symbol("end-of-stream");

export type EndOfStream = typeof END_OF_STREAM;

export class LineChannel {
  private partial = "";
  private lines: string[] = [];
  private ended = false;
  private waiters: Array<() => void> = [];

  /**
   * Append a chunk. Ignored after end().
   */
  push(chunk: string): void {
    if (this.ended || chunk === "") return;

    const parts = (this.partial + chunk).split("\n");
    this.partial = parts.pop() ?? "";

    if (parts.length === 0) return;

    for (const part of parts) {
      this.lines.push(part.endsWith("\r") ? part.slice(0, -1) : part);
    }
    this.wake();
  }

  /**
   * Close the channel. A pending partial line becomes the last line.
   */
  end(): void {
    if (this.ended) return;

    if (this.partial !== "") {
      this.lines.push(this.partial.endsWith("\r") ? this.partial.slice(0, -1) : this.partial);
      this.partial = "";
    }
    this.ended = true;
    this.wake();
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Take all buffered lines, waiting if there are none yet.
   * END_OF_STREAM once ended and drained.
   */
  async next(): Promise<string[] | EndOfStream> {
    for (;;) {
      if (this.lines.length > 0) {
        const batch = this.lines;
        this.lines = [];
        return batch;
      }
      if (this.ended) {
        return END_OF_STREAM;
      }
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
