import { formatLedger } from '../src/cli/ledger';
import { ownershipState } from './fixtures';

describe('formatLedger', () => {
  it('prints holdings, pending external sales and the last leaderboard', () => {
    const state = ownershipState({ alpha: { TSLA: 4 } });
    state.snapshots.alpha = {
      portfolioName: 'alpha',
      indexId: '13',
      symbols: ['TSLA', 'FIX'],
      capturedAt: '2026-01-05T14:30:00.000Z'
    };
    state.externalSales.push({
      id: 'ext-1',
      portfolioName: 'alpha',
      symbol: 'TSLA',
      quantity: 2,
      estimatedProceeds: 500,
      usedForReinvestment: false,
      detectedAt: '2026-01-05T14:30:00.000Z'
    });

    expect(formatLedger(state, ['alpha', 'beta'])).toEqual([
      '== alpha ==',
      'Leaderboard: TSLA, FIX (2026-01-05T14:30:00.000Z)',
      '  TSLA   qty 4.000000 cost 400.00 since 2025-12-01T14:30:00.000Z',
      '  external sale TSLA qty 2 est. 500.00 (2026-01-05T14:30:00.000Z)',
      '== beta ==',
      'Leaderboard: none yet',
      'No bot-owned holdings.'
    ]);
  });
});
