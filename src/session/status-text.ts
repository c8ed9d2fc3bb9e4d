import type { SessionState } from './session.js';

/**
 * A string derived from other fields, computed on first use and dropped
 * whenever one of those fields changes.
 */
export class CachedText {
  private value: string | null = null;

  get(compute: () => string): string {
    if (this.value === null) {
      this.value = compute();
    }
    return this.value;
  }

  invalidate(): void {
    this.value = null;
  }
}

export type StatusInput = {
  name: string;
  state: SessionState;
  jobRunning: boolean;
  title: string | null;
};

export function statusLabel(input: StatusInput): string {
  if (input.state === 'frozen') {
    return input.jobRunning ? 'frozen' : 'frozen-finished';
  }
  if (input.title !== null) return input.title;
  return input.jobRunning ? 'running' : 'finished';
}

/** Text shown for the document name and status, e.g. `bash [running]`. */
export function computeStatusText(input: StatusInput): string {
  return `${input.name} [${statusLabel(input)}]`;
}
