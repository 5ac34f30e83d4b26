import fs from 'fs';
import path from 'path';
import { BotConfig, PortfolioConfig } from './types';
import { botConfigSchema, formatIssues } from './schema';
import { ConfigurationError, errorMessage } from './errors';
import { readJSONFile } from './utils';

export const defaultConfigPath = () => path.resolve(process.cwd(), 'src/config/default.json');

const intFromEnv = (raw: string | undefined): number | undefined => {
  if (!raw || !raw.trim()) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const envOverrides = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {};
  if (env.LEDGER_STORE) overrides.ledgerStore = env.LEDGER_STORE.toLowerCase();
  if (env.LEDGER_FILE) overrides.ledgerFile = env.LEDGER_FILE;
  if (env.BROKER_PROVIDER) overrides.brokerProvider = env.BROKER_PROVIDER.toLowerCase();
  if (env.LEADERBOARD_PROVIDER) overrides.leaderboardProvider = env.LEADERBOARD_PROVIDER.toLowerCase();
  if (env.STUB_BROKER_FILE) overrides.stubBrokerFile = env.STUB_BROKER_FILE;
  const timeout = intFromEnv(env.BROKER_TIMEOUT_MS);
  if (timeout !== undefined) overrides.brokerTimeoutMs = timeout;
  const port = intFromEnv(env.WEBHOOK_PORT);
  if (port !== undefined) overrides.webhookPort = port;
  if (env.WEBHOOK_BIND) overrides.webhookBind = env.WEBHOOK_BIND;
  return overrides;
};

export const parseConfig = (raw: unknown, env: NodeJS.ProcessEnv = process.env): BotConfig => {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError('Config must be a JSON object');
  }
  const merged: Record<string, unknown> = { ...raw, ...envOverrides(env) };
  if (env.CRON_SCHEDULE) {
    const schedule = typeof merged.schedule === 'object' && merged.schedule !== null ? merged.schedule : {};
    merged.schedule = { ...schedule, cron: env.CRON_SCHEDULE };
  }
  const result = botConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError('Invalid bot config', formatIssues(result.error));
  }
  const config: BotConfig = {
    ...result.data,
    portfolios: result.data.portfolios.map((p) => ({ ...p }))
  };
  assertPortfolioTopology(config);
  return config;
};

export const loadConfig = (configPath: string = defaultConfigPath(), env: NodeJS.ProcessEnv = process.env): BotConfig => {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }
  let raw: unknown;
  try {
    raw = readJSONFile(configPath);
  } catch (err) {
    throw new ConfigurationError(`Config file is not valid JSON: ${configPath}`, [errorMessage(err)]);
  }
  return parseConfig(raw, env);
};

export const enabledPortfolios = (config: BotConfig): PortfolioConfig[] => config.portfolios.filter((p) => p.enabled);

// An in-memory ledger forgets ownership between runs, so shared symbols could not be apportioned.
export const assertPortfolioTopology = (config: BotConfig, persistent = config.ledgerStore !== 'memory') => {
  const enabled = enabledPortfolios(config);
  if (!enabled.length) {
    throw new ConfigurationError('No enabled portfolios configured');
  }
  if (enabled.length > 1 && !persistent) {
    throw new ConfigurationError(
      `${enabled.length} enabled portfolios require a persistent ledger store (LEDGER_STORE=file)`,
      enabled.map((p) => p.portfolioName)
    );
  }
};
