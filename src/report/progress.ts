/** Minimal writable surface, satisfied by process.stdout/stderr and test sinks. */
export interface OutputStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const BAR_WIDTH = 40;
const TICK_MS = 100;
const CLEAR_LINE = '\r\x1b[2K';

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, '0')).join(':');
}

/** `[####----]`, clamped to [0, total]. An empty total renders full. */
export function formatBar(position: number, total: number, width = BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, position / total)) : 1;
  const filled = Math.round(ratio * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

/**
 * Single-line progress indicator: a determinate bar when the amount of
 * work is known, otherwise a spinner with a message. Redraws only when
 * the stream is a TTY; `println` always writes, above the indicator.
 */
export class ProgressDisplay {
  private position = 0;
  private frame = 0;
  private message: string;
  private timer: ReturnType<typeof setInterval> | null = null;
  private startedAt = 0;
  private finished = false;

  constructor(
    private readonly stream: OutputStream,
    private readonly total?: number,
    message = '',
  ) {
    this.message = message;
  }

  private get interactive(): boolean {
    return this.stream.isTTY === true;
  }

  start(): void {
    this.startedAt = Date.now();
    if (!this.interactive) return;
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
      this.draw();
    }, TICK_MS);
    this.timer.unref();
    this.draw();
  }

  inc(delta = 1): void {
    if (this.total === undefined) return;
    this.position += delta;
    this.draw();
  }

  setMessage(message: string): void {
    this.message = message;
    this.draw();
  }

  println(text: string): void {
    if (this.interactive && !this.finished) {
      this.stream.write(CLEAR_LINE);
    }
    this.stream.write(`${text}\n`);
    this.draw();
  }

  finish(message: string): void {
    if (this.finished) return;
    this.finished = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.interactive) {
      this.stream.write(`${CLEAR_LINE}${this.render(message)}\n`);
    }
  }

  private render(message: string): string {
    const spinner = SPINNER_FRAMES[this.frame] ?? '';
    if (this.total === undefined) {
      return `${spinner} ${message}`;
    }
    const percent = this.total > 0 ? Math.floor((this.position / this.total) * 100) : 100;
    const elapsed = formatElapsed(Date.now() - this.startedAt);
    const bar = formatBar(this.position, this.total);
    return `${spinner} [${elapsed}] ${bar} ${this.position}/${this.total} (${percent}%) ${message}`.trimEnd();
  }

  private draw(): void {
    if (!this.interactive || this.finished) return;
    this.stream.write(`${CLEAR_LINE}${this.render(this.message)}`);
  }
}
