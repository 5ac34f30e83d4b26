import { PortfolioRunSummary, RunSummary } from '../core/types';
import { RunFailure } from './notifier.types';

export const mdSection = (title: string, body: string) => `## ${title}\n${body.trim()}\n`;

export const bulletList = (items: string[]) =>
  items.length ? items.map((i) => `- ${i}`).join('\n') + '\n' : '_None_\n';

const usd = (value: number) => `$${value.toFixed(2)}`;

const portfolioBody = (p: PortfolioRunSummary) => {
  const lines = [`Status: ${p.status}`, `Leaderboard: ${p.current.join(', ') || 'n/a'} (was ${p.previous.join(', ') || 'none'})`];
  if (p.error) lines.push(`Error: ${p.error.code} ${p.error.message}`);
  lines.push(`Proceeds ${usd(p.proceeds)}, invested ${usd(p.invested)}`);
  if (p.performance) {
    lines.push(
      `Market value ${usd(p.performance.marketValue)} (P&L ${usd(p.performance.unrealizedPnl)}, return ${p.performance.totalReturnPct}%)`
    );
  }
  const executed = p.executed.map(
    (l) => `${l.simulated ? '[simulated] ' : ''}${l.action} ${l.quantity.toFixed(6)} ${l.symbol} @ ${usd(l.price)} = ${usd(l.total)}`
  );
  const skipped = p.skipped.map((s) => `${s.action} ${s.symbol}: ${s.code} ${s.reason}`);
  const mismatches = p.mismatches.map((m) => `${m.code} ${m.symbol ?? ''} ${m.message}`.replace(/\s+/g, ' '));
  return [
    bulletList(lines),
    `Executed:\n${bulletList(executed)}`,
    `Skipped:\n${bulletList(skipped)}`,
    `Mismatches:\n${bulletList(mismatches)}`
  ].join('\n');
};

export const summarySubject = (summary: RunSummary) => {
  const failed = summary.portfolios.filter((p) => p.status === 'FAILED').length;
  const partial = summary.portfolios.filter((p) => p.status === 'PARTIAL').length;
  const state = failed ? `${failed} failed` : partial ? `${partial} partial` : 'ok';
  return `Rebalance ${summary.runId}${summary.dryRun ? ' (dry run)' : ''}: ${state}`;
};

export const formatRunSummary = (summary: RunSummary): string => {
  const sections = [`# ${summarySubject(summary)}\n`];
  for (const p of summary.portfolios) {
    sections.push(mdSection(p.portfolioName, portfolioBody(p)));
  }
  if (summary.mismatches.length) {
    sections.push(mdSection('Run mismatches', bulletList(summary.mismatches.map((m) => `${m.code} ${m.message}`))));
  }
  return sections.join('\n');
};

export const failureSubject = (failure: RunFailure) => `Rebalance ${failure.runId}: aborted`;

export const formatRunFailure = (failure: RunFailure): string =>
  [`# ${failureSubject(failure)}\n`, mdSection('Error', `${failure.code} ${failure.message}`)].join('\n');
