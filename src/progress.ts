/**
 * Single-line progress display for long-running CLI steps
 */

/** The part of a terminal stream the tracker draws on */
export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface ProgressOptions {
  total: number;
  label?: string;
  unit?: string;
  /** Defaults to whether the stream is a terminal */
  enabled?: boolean;
  stream?: ProgressStream;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  eta: number;
  rate: number;
  isComplete: boolean;
}

export class ProgressTracker {
  private current = 0;
  private total: number;
  private label: string;
  private unit: string;
  private startTime = Date.now();
  private enabled: boolean;
  private stream: ProgressStream;
  private lastUpdate = 0;
  private updateIntervalMs = 100;

  constructor(options: ProgressOptions) {
    this.total = options.total;
    this.label = options.label || 'Progress';
    this.unit = options.unit || 'items';
    this.stream = options.stream ?? process.stdout;
    this.enabled = options.enabled ?? Boolean(this.stream.isTTY);
  }

  increment(amount: number = 1): void {
    this.current = Math.min(this.current + amount, this.total);
    this.updateDisplay();
  }

  complete(): void {
    this.current = this.total;
    this.lastUpdate = 0;
    this.updateDisplay();
    if (this.enabled) {
      this.stream.write('\n');
    }
  }

  getStats(): ProgressStats {
    const elapsed = (Date.now() - this.startTime) / 1000;
    const rate = elapsed > 0 ? this.current / elapsed : 0;
    const remaining = this.total - this.current;
    const eta = rate > 0 ? remaining / rate : 0;

    return {
      current: this.current,
      total: this.total,
      percent: this.total > 0 ? (this.current / this.total) * 100 : 100,
      elapsed: Math.round(elapsed),
      eta: Math.round(eta),
      rate: Math.round(rate * 10) / 10,
      isComplete: this.current >= this.total
    };
  }

  private formatTime(seconds: number): string {
    if (seconds < 60) return `${Math.round(seconds)}s`;
    if (seconds < 3600) {
      const mins = Math.floor(seconds / 60);
      const secs = Math.round(seconds % 60);
      return `${mins}m ${secs}s`;
    }
    const hours = Math.floor(seconds / 3600);
    const mins = Math.floor((seconds % 3600) / 60);
    return `${hours}h ${mins}m`;
  }

  private createBar(width: number = 20): string {
    const ratio = this.total > 0 ? this.current / this.total : 1;
    const filled = Math.round(ratio * width);
    return '[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']';
  }

  private updateDisplay(): void {
    if (!this.enabled) return;

    const now = Date.now();
    if (now - this.lastUpdate < this.updateIntervalMs && this.current < this.total) {
      return;
    }
    this.lastUpdate = now;

    const stats = this.getStats();
    const parts: string[] = [`${this.label}:`, this.createBar()];
    parts.push(`${this.current}/${this.total}`);
    parts.push(`${Math.round(stats.percent)}%`);
    parts.push(this.formatTime(stats.elapsed));

    if (stats.current > 0 && !stats.isComplete) {
      parts.push(`ETA ${this.formatTime(stats.eta)}`);
      parts.push(`${stats.rate} ${this.unit}/s`);
    }

    this.stream.write('\r' + ' '.repeat(100));
    this.stream.write('\r' + parts.join(' '));
  }
}
