/**
 * Transport progress display.
 *
 * The transport reports raw events as often as it likes; Progress keeps a
 * download-rate estimate, waits a short moment before showing anything, and
 * then redraws at a bounded frequency through a ProgressOutput.
 */

import ora from 'ora';

import type { GitProgress } from '../credentials/types';

const UPDATE_HZ = 30;
const INITIAL_DELAY_MS = 250;
const BAR_WIDTH = 20;
// Time window (seconds) of the moving average over unevenly spaced samples.
const RATE_WINDOW_S = 2;
const BINARY_PREFIXES = ['', 'Ki', 'Mi', 'Gi', 'Ti', 'Pi', 'Ei', 'Zi', 'Yi'];

export interface ProgressOutput {
  update(line: string): void;
  clear(): void;
}

/**
 * Renders progress lines as the text of an ora spinner.
 */
export class SpinnerProgressOutput implements ProgressOutput {
  private spinner: ReturnType<typeof ora> | null = null;

  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

  update(line: string): void {
    if (!this.spinner) {
      this.spinner = ora({ text: line, stream: this.stream }).start();
      return;
    }
    this.spinner.text = line;
  }

  clear(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

export function binaryPrefix(value: number): [number, string] {
  let scaled = value;
  let i = 0;
  while (Math.abs(scaled) >= 1024 && i < BINARY_PREFIXES.length - 1) {
    scaled /= 1024;
    i += 1;
  }
  return [scaled, BINARY_PREFIXES[i]];
}

/**
 * Exponential moving average of the byte rate.
 */
class RateEstimate {
  private lastTotal: number | null = null;
  private lastSampleMs = 0;
  private avgRate: number | null = null;

  /** Returns bytes per second, or undefined until two samples exist. */
  update(nowMs: number, total: number): number | undefined {
    if (this.lastTotal === null) {
      this.lastTotal = total;
      this.lastSampleMs = nowMs;
      return undefined;
    }
    const dt = (nowMs - this.lastSampleMs) / 1000;
    if (dt <= 0) {
      return this.avgRate ?? undefined;
    }
    const sample = (total - this.lastTotal) / dt;
    this.lastTotal = total;
    this.lastSampleMs = nowMs;

    if (this.avgRate === null) {
      this.avgRate = sample;
    } else {
      const alpha = 1 - Math.exp(-dt / RATE_WINDOW_S);
      this.avgRate += alpha * (sample - this.avgRate);
    }
    return this.avgRate;
  }
}

function formatBytes(value: number, suffix: string): string {
  const [scaled, prefix] = binaryPrefix(value);
  return `${scaled.toFixed(1).padStart(5)} ${prefix}${suffix}`;
}

function drawBar(overall: number): string {
  const clamped = Math.min(Math.max(overall, 0), 1);
  const filled = Math.floor(clamped * BAR_WIDTH);
  return `[${'='.repeat(filled)}${' '.repeat(BAR_WIDTH - filled)}]`;
}

export function formatProgressLine(event: GitProgress, rate: number | undefined): string {
  const parts = [`${(100 * event.overall).toFixed(0).padStart(3)}%`];
  if (event.bytesDownloaded !== undefined) {
    parts.push(formatBytes(event.bytesDownloaded, 'B'));
  }
  if (rate !== undefined) {
    parts.push(`at ${formatBytes(rate, 'B/s')}`);
  }
  parts.push(drawBar(event.overall));
  return parts.join(' ');
}

export class Progress {
  private nextPrintMs: number;
  private readonly rate = new RateEstimate();

  constructor(startMs: number) {
    this.nextPrintMs = startMs + INITIAL_DELAY_MS;
  }

  update(nowMs: number, event: GitProgress, output: ProgressOutput): void {
    if (event.overall >= 1) {
      output.clear();
      return;
    }

    const rate = event.bytesDownloaded === undefined ? undefined : this.rate.update(nowMs, event.bytesDownloaded);
    if (nowMs < this.nextPrintMs) {
      return;
    }
    this.nextPrintMs = nowMs + 1000 / UPDATE_HZ;
    output.update(formatProgressLine(event, rate));
  }
}
