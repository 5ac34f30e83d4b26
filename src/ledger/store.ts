import { BotConfig } from '../core/types';
import { FileLedgerStore } from './fileStore';
import { MemoryLedgerStore } from './memoryStore';
import { LedgerStore } from './ledgerStore.types';

export const getLedgerStore = (config: BotConfig): LedgerStore => {
  if (config.ledgerStore === 'memory') {
    return new MemoryLedgerStore();
  }
  return new FileLedgerStore(config.ledgerFile);
};

export { FileLedgerStore, MemoryLedgerStore };
export type { LedgerStore };
