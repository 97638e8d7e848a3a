/**
 * Timestamped line output for scenario observers.
 *
 * Every line gets a local wall-clock prefix with microseconds. When more than
 * `gapThresholdUs` passed since the previous line, a separator line shows the
 * gap, which makes a reply held back by a delayed predecessor easy to spot.
 */

export type LineSink = (line: string) => void;

/** Current time in microseconds since the epoch */
export type MicrosecondClock = () => number;

export const systemClock: MicrosecondClock = () =>
  Math.round((performance.timeOrigin + performance.now()) * 1000);

export interface ScenarioLogOptions {
  sink?: LineSink;
  clock?: MicrosecondClock;
  /** Default: 5000 (5 ms) */
  gapThresholdUs?: number;
  /** Appended to the timestamp, e.g. "#3: " for a server connection */
  tag?: string;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/** Format epoch microseconds as "YYYY-MM-DD HH:MM:SS.uuuuuu" in local time */
export function formatTimestamp(epochUs: number): string {
  const date = new Date(Math.floor(epochUs / 1000));
  const micros = ((epochUs % 1_000_000) + 1_000_000) % 1_000_000;
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)} ` +
    `${pad(date.getHours(), 2)}:${pad(date.getMinutes(), 2)}:${pad(date.getSeconds(), 2)}` +
    `.${pad(micros, 6)}`
  );
}

/** Format a duration in microseconds as "S.uuuuuu" */
export function formatDuration(us: number): string {
  return `${Math.floor(us / 1_000_000)}.${pad(us % 1_000_000, 6)}`;
}

export class ScenarioLog {
  private readonly sink: LineSink;
  private readonly clock: MicrosecondClock;
  private readonly gapThresholdUs: number;
  private readonly tag: string;
  private readonly shared: { lastUs: number | null };

  constructor(options: ScenarioLogOptions = {}, shared?: { lastUs: number | null }) {
    this.sink = options.sink ?? (line => console.log(line));
    this.clock = options.clock ?? systemClock;
    this.gapThresholdUs = options.gapThresholdUs ?? 5000;
    this.tag = options.tag ?? "";
    this.shared = shared ?? { lastUs: null };
  }

  /** A log writing to the same sink, sharing gap tracking, with its own tag */
  child(tag: string): ScenarioLog {
    return new ScenarioLog(
      { sink: this.sink, clock: this.clock, gapThresholdUs: this.gapThresholdUs, tag },
      this.shared,
    );
  }

  /** Write one timestamped line */
  line(message: string): void {
    const now = this.clock();
    const last = this.shared.lastUs;
    if (last !== null && now - last > this.gapThresholdUs) {
      this.sink(`<... ${formatDuration(now - last)} seconds ...>`);
    }
    this.shared.lastUs = now;
    this.sink(`${formatTimestamp(now)}: ${this.tag}${message}`);
  }

  /** Write lines verbatim, without timestamp or gap tracking */
  raw(...lines: string[]): void {
    for (const line of lines) this.sink(line);
  }
}
