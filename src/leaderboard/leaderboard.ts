import path from 'path';
import { BotConfig } from '../core/types';
import { ConfigurationError } from '../core/errors';
import { HttpLeaderboardClient } from './leaderboardClient';
import { StubLeaderboard } from './leaderboard.stub';
import { LeaderboardSource } from './leaderboard.types';

export const getLeaderboard = (config: BotConfig, env: NodeJS.ProcessEnv = process.env): LeaderboardSource => {
  if (config.leaderboardProvider === 'http') {
    const apiUrl = env.LEADERBOARD_API_URL;
    const apiToken = env.LEADERBOARD_API_TOKEN;
    if (!apiUrl || !apiToken) {
      throw new ConfigurationError('LEADERBOARD_PROVIDER=http requires LEADERBOARD_API_URL and LEADERBOARD_API_TOKEN');
    }
    return new HttpLeaderboardClient({ apiUrl, apiToken });
  }
  return StubLeaderboard.fromFile(path.resolve(config.stubLeaderboardFile));
};

export { HttpLeaderboardClient, StubLeaderboard };
export type { LeaderboardSource };
