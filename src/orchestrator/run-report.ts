import { formatRecordingNumber } from '../media/recording-name.js';

export type RunOutcome =
  | { status: 'succeeded' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

type Entry = { recordingNumber: number; reason?: string };

/**
 * Per-recording outcomes of one run, in the order they were recorded
 */
export class RunReport {
  private readonly entries: Record<RunOutcome['status'], Entry[]> = {
    succeeded: [],
    skipped: [],
    failed: [],
  };

  record(recordingNumber: number, outcome: RunOutcome): void {
    const reason = outcome.status === 'succeeded' ? undefined : outcome.reason;
    this.entries[outcome.status].push({ recordingNumber, reason });
  }

  get succeeded(): number[] {
    return this.entries.succeeded.map((entry) => entry.recordingNumber);
  }

  get skipped(): number[] {
    return this.entries.skipped.map((entry) => entry.recordingNumber);
  }

  get failed(): number[] {
    return this.entries.failed.map((entry) => entry.recordingNumber);
  }

  /**
   * Failure reason per recording number
   */
  failures(): Array<{ recordingNumber: number; reason: string }> {
    return this.entries.failed.map(({ recordingNumber, reason }) => ({ recordingNumber, reason: reason ?? 'unknown' }));
  }

  isSuccess(): boolean {
    return this.entries.failed.length === 0;
  }

  render(): string[] {
    const list = (entries: Entry[]) => entries.map((entry) => formatRecordingNumber(entry.recordingNumber)).join(', ');
    const { succeeded, skipped, failed } = this.entries;

    const lines = [`Succeeded: ${succeeded.length}`];
    if (succeeded.length > 0) lines.push(`  ${list(succeeded)}`);

    lines.push(`Skipped: ${skipped.length} (already downloaded)`);
    if (skipped.length > 0) lines.push(`  ${list(skipped)}`);

    lines.push(`Failed: ${failed.length}`);
    for (const { recordingNumber, reason } of this.failures()) {
      lines.push(`  #${formatRecordingNumber(recordingNumber)}: ${reason}`);
    }

    return lines;
  }
}
