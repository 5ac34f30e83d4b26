import fs from 'fs';
import { SourceUnavailableError } from '../core/errors';
import { formatIssues, stubLeaderboardFileSchema } from '../core/schema';
import { normalizeSymbol } from '../core/utils';
import { LeaderboardSource } from './leaderboard.types';

/** Fixed lists keyed by index id, or by `indexId@YYYY-MM-DD` for a specific week. */
export class StubLeaderboard implements LeaderboardSource {
  readonly name = 'stub';
  private boards: Record<string, string[]>;

  constructor(boards: Record<string, string[]> = {}) {
    this.boards = { ...boards };
  }

  static fromFile(filePath: string): StubLeaderboard {
    if (!fs.existsSync(filePath)) {
      throw new SourceUnavailableError('leaderboard', `stub file not found: ${filePath}`);
    }
    const parsed = stubLeaderboardFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    if (!parsed.success) {
      throw new SourceUnavailableError('leaderboard', `invalid stub file: ${formatIssues(parsed.error).join('; ')}`);
    }
    return new StubLeaderboard(parsed.data);
  }

  set(indexId: string, symbols: string[]) {
    this.boards[indexId] = symbols;
  }

  async fetchTopN(indexId: string, n: number, asOfDay?: string): Promise<string[]> {
    const board = (asOfDay && this.boards[`${indexId}@${asOfDay}`]) || this.boards[indexId];
    if (!board) {
      throw new SourceUnavailableError('leaderboard', `no leaderboard for index ${indexId}`);
    }
    const symbols: string[] = [];
    for (const raw of board) {
      const symbol = normalizeSymbol(raw);
      if (symbol && !symbols.includes(symbol)) symbols.push(symbol);
    }
    return symbols.slice(0, n);
  }
}
