import type { ExtractionProgress } from '../../types';

export type ProgressWriter = (line: string) => void;

const formatTime = (seconds: number): string => {
  if (seconds < 60) return `${seconds.toFixed(0)}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${(seconds % 60).toFixed(0)}s`;
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
};

/**
 * Progress tracker for incremental extraction
 * Turns the counts reported after each step into percent and ETA lines
 */
export class ProgressTracker {
  private startTime: number;
  private lastUpdateTime: number;
  private total: number = 0;
  private settled: number = 0;
  private dropped: number = 0;
  private label: string;
  private write: ProgressWriter;
  private lastReportedPercent: number = -1;

  constructor(label: string, write: ProgressWriter = (line) => process.stdout.write(line)) {
    this.label = label;
    this.write = write;
    this.startTime = Date.now();
    this.lastUpdateTime = this.startTime;
  }

  /**
   * Record the state after an extraction step
   */
  update(progress: ExtractionProgress): void {
    this.total = progress.total;
    this.settled = progress.uncompressedCount + progress.droppedCount;
    this.dropped = progress.droppedCount;
    this.reportProgress();
  }

  /**
   * Report if 1% or more progress was made, or 500ms have passed since the last report
   */
  private reportProgress(): void {
    const now = Date.now();
    const percent = this.getProgressPercent();
    const shouldReport =
      percent > this.lastReportedPercent ||
      (now - this.lastUpdateTime) > 500;

    if (shouldReport) {
      this.lastReportedPercent = percent;
      this.lastUpdateTime = now;
      this.printProgress();
    }
  }

  private printProgress(): void {
    const rate = this.getProcessingRate();
    const eta = rate > 0 ? (this.total - this.settled) / rate : 0;
    this.write(
      `\r${this.label}: ${this.getProgressPercent()}% (${this.settled}/${this.total} entries) ETA: ${formatTime(eta)}`
    );
  }

  /**
   * Complete progress tracking
   */
  complete(): void {
    const elapsed = (Date.now() - this.startTime) / 1000;
    const failures = this.dropped > 0 ? `, ${this.dropped} dropped` : '';
    this.write(
      `\r${this.label}: 100% (${this.total} entries${failures}) completed in ${elapsed.toFixed(1)}s\n`
    );
  }

  /**
   * Share of entries that are extracted or dropped
   */
  getProgressPercent(): number {
    if (this.total === 0) return 100;
    return Math.floor((this.settled / this.total) * 100);
  }

  /**
   * Entries settled per second
   */
  getProcessingRate(): number {
    const elapsed = (Date.now() - this.startTime) / 1000;
    return elapsed > 0 ? this.settled / elapsed : 0;
  }
}
