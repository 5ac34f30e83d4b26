export interface LeaderboardSource {
  readonly name: string;
  /** Ordered, upper-cased, de-duplicated; at most `n` symbols. */
  fetchTopN(indexId: string, n: number, asOfDay?: string): Promise<string[]>;
}
