/**
 * Per-job average query times collected for the lifetime of the watcher,
 * used to estimate how long the next job will take
 */
export class PipelineStats {
  private averages: number[] = [];
  private overallAvg: number | null = null;

  /**
   * Add the observed average seconds per query of a finished job
   */
  record(avgQuerySeconds: number): void {
    this.averages.push(avgQuerySeconds);
    const total = this.averages.reduce((sum, value) => sum + value, 0);
    this.overallAvg = total / this.averages.length;
  }

  /** Mean of all recorded job averages, null before the first job */
  get overallAverage(): number | null {
    return this.overallAvg;
  }

  get jobCount(): number {
    return this.averages.length;
  }

  /**
   * Estimated seconds for a job with the given number of queries, null while unknown
   */
  estimateSeconds(numberQueries: number): number | null {
    return this.overallAvg === null ? null : this.overallAvg * numberQueries;
  }
}
