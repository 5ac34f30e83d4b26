import 'dotenv/config';
import { Command } from 'commander';
import { LedgerState } from '../core/types';
import { loadConfig } from '../core/config';
import { getLedgerStore } from '../ledger/store';
import { OwnershipLedger } from '../ledger/ownershipLedger';
import { ownershipRecords, unconsumedExternalSales } from '../ledger/ownership';
import { getRecentRuns } from '../journal/runJournal';

const program = new Command();

type LedgerCliOptions = { portfolio?: string; json?: boolean; runs?: string };

program
  .option('--portfolio <name>', 'only this portfolio')
  .option('--json', 'print the raw ledger document', false)
  .option('--runs <count>', 'also list the most recent runs', '0');

export const formatLedger = (state: LedgerState, portfolioNames: string[]): string[] => {
  const lines: string[] = [];
  for (const name of portfolioNames) {
    lines.push(`== ${name} ==`);
    const snapshot = state.snapshots[name];
    lines.push(`Leaderboard: ${snapshot ? `${snapshot.symbols.join(', ')} (${snapshot.capturedAt})` : 'none yet'}`);
    const records = ownershipRecords(state, name);
    if (!records.length) lines.push('No bot-owned holdings.');
    records.forEach((r) => {
      lines.push(`  ${r.symbol.padEnd(6)} qty ${r.quantity.toFixed(6)} cost ${r.totalCost.toFixed(2)} since ${r.firstPurchaseAt}`);
    });
    unconsumedExternalSales(state, name).forEach((s) => {
      lines.push(`  external sale ${s.symbol} qty ${s.quantity} est. ${s.estimatedProceeds.toFixed(2)} (${s.detectedAt})`);
    });
  }
  return lines;
};

export const printLedger = async (options: LedgerCliOptions, config = loadConfig()) => {
  const ledger = new OwnershipLedger(getLedgerStore(config));
  const state = await ledger.state();
  if (options.json) {
    console.log(JSON.stringify(state, null, 2));
    return;
  }
  const names = options.portfolio ? [options.portfolio] : config.portfolios.map((p) => p.portfolioName);
  formatLedger(state, names).forEach((line) => console.log(line));
  const runCount = Number(options.runs ?? 0);
  if (runCount > 0) {
    console.log('Recent runs:');
    getRecentRuns(runCount).forEach((r) => console.log(`  ${r.runId} ${r.status}`));
  }
};

if (require.main === module) {
  printLedger(program.parse(process.argv).opts<LedgerCliOptions>()).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
