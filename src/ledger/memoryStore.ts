import { LedgerState } from '../core/types';
import { LedgerStore, LedgerUnit, emptyLedgerState } from './ledgerStore.types';

export class MemoryLedgerStore implements LedgerStore {
  readonly persistent = false;
  private state: LedgerState;

  constructor(initial: LedgerState = emptyLedgerState()) {
    this.state = structuredClone(initial);
  }

  async snapshot(): Promise<LedgerState> {
    return structuredClone(this.state);
  }

  async transact<T>(_unit: LedgerUnit, fn: (draft: LedgerState) => T): Promise<T> {
    const draft = structuredClone(this.state);
    const result = fn(draft);
    this.state = draft;
    return result;
  }
}
