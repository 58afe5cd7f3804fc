// Where accepted submissions are mirrored for people to read. Both calls are best-effort from the
// ledger's point of view: a failure is logged and never undoes a persisted submission.

export interface ReportSink {
  /** Writes one accepted submission into the period's report. */
  writeRow(periodId: string, day: string, ordinal: number, link: string): Promise<void>;
  /** Creates the empty report for a new period and returns its ref. */
  generateEmptyTemplate(periodId: string, targetPerDay: number, dateRange: string[]): Promise<string>;
}

export type ReportRow = { periodId: string; day: string; ordinal: number; link: string };

// Keeps everything in memory; used by tests and STORE=memory runs without a report directory.
export class MemoryReportSink implements ReportSink {
  readonly rows: ReportRow[] = [];
  readonly templates = new Map<string, { targetPerDay: number; dateRange: string[] }>();

  async writeRow(periodId: string, day: string, ordinal: number, link: string): Promise<void> {
    this.rows.push({ periodId, day, ordinal, link });
  }

  async generateEmptyTemplate(periodId: string, targetPerDay: number, dateRange: string[]): Promise<string> {
    this.templates.set(periodId, { targetPerDay, dateRange: [...dateRange] });
    return `memory:${periodId}`;
  }
}
