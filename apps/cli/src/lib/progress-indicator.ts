/**
 * Progress Indicator - terminal spinner shown while a restart is in flight
 *
 * Runs on an event-loop timer. stop() and clear() cancel it before
 * returning, so nothing else is written to the line afterwards.
 */

export const SPINNER_FRAMES = ['⢿', '⣻', '⣽', '⣾', '⣷', '⣯', '⣟', '⡿'] as const;

export const DEFAULT_SPINNER_INTERVAL_MS = 100;

/**
 * The subset of a terminal stream the spinner writes to
 */
export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface ProgressOptions {
  intervalMs?: number;
  stream?: ProgressStream;
}

export interface ProgressHandle {
  /** Replace the spinner with the final result text */
  stop(finalText?: string): void;
  /** Remove the spinner without printing a result */
  clear(): void;
}

export class ProgressIndicator implements ProgressHandle {
  private timer?: NodeJS.Timeout;
  private frame = 0;
  private done = false;
  private readonly animated: boolean;

  private constructor(
    private readonly label: string,
    private readonly stream: ProgressStream,
    intervalMs: number
  ) {
    this.animated = stream.isTTY === true;

    if (this.animated) {
      this.render();
      this.timer = setInterval(() => this.render(), intervalMs);
    }
  }

  static start(label: string, options: ProgressOptions = {}): ProgressIndicator {
    return new ProgressIndicator(
      label,
      options.stream ?? process.stdout,
      options.intervalMs ?? DEFAULT_SPINNER_INTERVAL_MS
    );
  }

  stop(finalText = ''): void {
    if (!this.halt()) return;
    this.stream.write(`${this.label} ${finalText}\n`);
  }

  clear(): void {
    this.halt();
  }

  private render(): void {
    const glyph = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
    this.frame += 1;
    this.stream.write(`\r${this.label} ${glyph}`);
  }

  /**
   * Cancel the timer and blank the line. Returns false if already halted.
   */
  private halt(): boolean {
    if (this.done) return false;
    this.done = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.animated) {
      this.stream.write(`\r${' '.repeat(this.label.length + 2)}\r`);
    }
    return true;
  }
}
