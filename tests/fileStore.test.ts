import fs from 'fs';
import path from 'path';
import { FileLedgerStore } from '../src/ledger/fileStore';
import { OwnershipLedger } from '../src/ledger/ownershipLedger';
import { SourceUnavailableError } from '../src/core/errors';
import { T0, tmpDir } from './fixtures';

describe('FileLedgerStore', () => {
  it('persists committed transactions across instances', async () => {
    const file = path.join(tmpDir('store'), 'ledger.json');
    const ledger = new OwnershipLedger(new FileLedgerStore(file));
    await ledger.apply('alpha', 'AAPL', 'BUY', 4, 50, T0);

    const reopened = new OwnershipLedger(new FileLedgerStore(file));
    expect(reopened.persistent).toBe(true);
    expect((await reopened.get('alpha', 'AAPL'))?.totalCost).toBe(200);
    expect(fs.readdirSync(path.dirname(file))).toEqual(['ledger.json']);
  });

  it('leaves the document untouched when a transaction throws', async () => {
    const file = path.join(tmpDir('store'), 'ledger.json');
    const store = new FileLedgerStore(file);
    await new OwnershipLedger(store).apply('alpha', 'AAPL', 'BUY', 4, 50, T0);
    const before = fs.readFileSync(file, 'utf-8');

    await expect(
      store.transact({ portfolioName: 'alpha', symbol: 'AAPL', action: 'SELL' }, (draft) => {
        delete draft.ownership.alpha;
        throw new Error('broker said no');
      })
    ).rejects.toThrow('broker said no');
    expect(fs.readFileSync(file, 'utf-8')).toBe(before);
  });

  it('starts empty when no document exists yet', async () => {
    const store = new FileLedgerStore(path.join(tmpDir('store'), 'missing.json'));
    expect(await store.snapshot()).toEqual({ ownership: {}, trades: [], externalSales: [], snapshots: {} });
  });

  it('reports a malformed document as an unavailable source', async () => {
    const file = path.join(tmpDir('store'), 'ledger.json');
    fs.writeFileSync(file, '{"trades": "nope"}');
    await expect(new FileLedgerStore(file).snapshot()).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
