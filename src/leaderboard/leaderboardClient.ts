import { SourceUnavailableError, errorMessage } from '../core/errors';
import { LeaderboardItem, leaderboardResponseSchema } from '../core/schema';
import { normalizeSymbol } from '../core/utils';
import { previousSunday } from '../core/time';
import { LeaderboardSource } from './leaderboard.types';

export interface HttpLeaderboardConfig {
  apiUrl: string;
  apiToken: string;
  algoId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  now?: () => Date;
}

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

const symbolOf = (item: LeaderboardItem): string | undefined => {
  if (typeof item === 'string') return item;
  return item.symbol ?? item.ticker ?? item.stock ?? item.code;
};

export const extractSymbols = (body: unknown, n: number): string[] => {
  const parsed = leaderboardResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new SourceUnavailableError('leaderboard', `unexpected response shape: ${parsed.error.issues[0]?.message}`);
  }
  const data = parsed.data;
  const items = Array.isArray(data) ? data : data.data ?? data.results ?? data.symbols ?? data.stocks ?? [];
  const symbols: string[] = [];
  for (const item of items) {
    const raw = symbolOf(item);
    if (!raw || !raw.trim()) continue;
    const symbol = normalizeSymbol(raw);
    if (!symbols.includes(symbol)) symbols.push(symbol);
    if (symbols.length >= n) break;
  }
  return symbols;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class HttpLeaderboardClient implements LeaderboardSource {
  readonly name = 'http';
  private config: HttpLeaderboardConfig;

  constructor(config: HttpLeaderboardConfig) {
    this.config = { ...config, apiUrl: config.apiUrl.replace(/\/$/, '') };
  }

  async fetchTopN(indexId: string, n: number, asOfDay?: string): Promise<string[]> {
    const momDay = asOfDay ?? previousSunday((this.config.now ?? (() => new Date()))());
    const body = await this.post({ indexId, algoId: this.config.algoId ?? '1', momDay });
    const symbols = extractSymbols(body, n);
    if (!symbols.length) {
      throw new SourceUnavailableError('leaderboard', `no symbols for index ${indexId} on ${momDay}`);
    }
    if (symbols.length < n) {
      console.warn(`[leaderboard] index ${indexId}: only ${symbols.length} symbols returned, expected ${n}`);
    }
    return symbols;
  }

  private async post(payload: Record<string, string>): Promise<unknown> {
    const maxRetries = this.config.maxRetries ?? 2;
    const retryDelayMs = this.config.retryDelayMs ?? 1000;
    let lastError = '';
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) await sleep(retryDelayMs * 2 ** (attempt - 1));
      let resp: Response;
      try {
        resp = await fetch(this.config.apiUrl, {
          method: 'POST',
          headers: { Authorization: `Bearer ${this.config.apiToken}`, 'Content-Type': 'application/json' },
          body: JSON.stringify(payload)
        });
      } catch (err) {
        lastError = errorMessage(err);
        continue;
      }
      if (resp.ok) {
        try {
          return await resp.json();
        } catch (err) {
          throw new SourceUnavailableError('leaderboard', `invalid JSON: ${errorMessage(err)}`, { cause: err });
        }
      }
      lastError = `HTTP ${resp.status}: ${await resp.text()}`;
      if (!RETRY_STATUSES.has(resp.status)) break;
    }
    throw new SourceUnavailableError('leaderboard', lastError || 'request failed');
  }
}
