import { Readable } from 'node:stream';

import { LedgerEngine } from '@clearledger/ledger';
import { ConsoleSink, flushLoggers, initLogger, type LogEntry } from '@clearledger/logger';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ProcessHandler } from '../process-handler.js';

function csv(...lines: string[]): Readable {
  return Readable.from([`${lines.join('\n')}\n`]);
}

describe('ProcessHandler', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    initLogger({
      level: 'warn',
      sinks: [
        {
          write: (entry) => entries.push(entry),
          flush: () => undefined,
        },
      ],
    });
  });

  afterEach(() => {
    initLogger({ sinks: [] });
  });

  it('replays deposits, withdrawals and a chargeback in input order', async () => {
    const handler = new ProcessHandler(new LedgerEngine());

    const result = await handler.execute({
      input: csv(
        'type,client,tx,amount',
        'deposit,1,1,100',
        'withdrawal,1,2,50',
        'dispute,1,1,',
        'chargeback,1,1,'
      ),
    });

    expect(result.isOk()).toBe(true);
    const summary = result._unsafeUnwrap();
    expect(summary).toMatchObject({ records: 4, accepted: 4, rejected: 0, rejectionsByCode: {} });
    expect(summary.balances).toHaveLength(1);
    const balance = summary.balances[0];
    expect(balance?.available.toString()).toBe('-50');
    expect(balance?.held.toString()).toBe('0');
    expect(balance?.total.toString()).toBe('-50');
    expect(balance?.locked).toBe(true);
    expect(entries).toEqual([]);
  });

  it('skips failing records, counts them by code and keeps going', async () => {
    const handler = new ProcessHandler(new LedgerEngine());

    const result = await handler.execute({
      input: csv(
        'type,client,tx,amount',
        'deposit,1,1,5',
        'withdrawal,2,3,10',
        'deposit,1,1,5',
        'deposit,3,4,',
        'deposit,1,5,1.25'
      ),
    });

    const summary = result._unsafeUnwrap();
    expect(summary).toMatchObject({
      records: 5,
      accepted: 2,
      rejected: 3,
      rejectionsByCode: { DUPLICATE_TRANSACTION: 1, INSUFFICIENT_FUNDS: 1, MISSING_AMOUNT: 1 },
    });

    const clientIds = summary.balances.map((balance) => balance.clientId).sort((a, b) => a - b);
    expect(clientIds).toEqual([1, 2]);
  });

  it('logs each skipped record with its transaction id and error code', async () => {
    const handler = new ProcessHandler(new LedgerEngine());

    await handler.execute({
      input: csv('type,client,tx,amount', 'deposit,1,7,5', 'deposit,1,7,5', 'refund,1,8,1'),
    });

    expect(entries.map((entry) => entry.msg)).toEqual([
      'Ignoring transaction with error',
      'Ignoring transaction with error',
    ]);
    expect(entries[0]).toMatchObject({
      level: 'warn',
      category: 'ProcessHandler',
      context: { tx: '7', code: 'DUPLICATE_TRANSACTION', error: 'Duplicate transaction 7' },
    });
    expect(entries[1]?.context).toMatchObject({ tx: '8', code: 'MALFORMED_RECORD' });
  });

  it('skips an amount with a huge exponent and applies the rows after it', async () => {
    const handler = new ProcessHandler(new LedgerEngine());

    const result = await handler.execute({
      input: csv('type,client,tx,amount', 'deposit,1,1,10', 'deposit,1,2,1e1000000000', 'deposit,1,3,5'),
    });

    const summary = result._unsafeUnwrap();
    expect(summary).toMatchObject({ records: 3, accepted: 2, rejected: 1, rejectionsByCode: { INVALID_AMOUNT: 1 } });
    expect(summary.balances[0]?.total.toString()).toBe('15');
    expect(entries[0]?.context).toMatchObject({ tx: '2', code: 'INVALID_AMOUNT' });
  });

  it('logs every skipped record even when thousands fail within one chunk', async () => {
    const lines: string[] = [];
    initLogger({ level: 'warn', sinks: [new ConsoleSink({ stream: { write: (chunk: string) => lines.push(chunk) } })] });
    const withdrawals = Array.from({ length: 2000 }, (_, i) => `withdrawal,1,${i + 1},1`);
    const handler = new ProcessHandler(new LedgerEngine());

    const result = await handler.execute({ input: csv('type,client,tx,amount', ...withdrawals) });
    flushLoggers();

    expect(result._unsafeUnwrap().rejectionsByCode).toEqual({ INSUFFICIENT_FUNDS: 2000 });
    const warnings = lines.filter((line) => line.includes('Ignoring transaction with error'));
    expect(warnings).toHaveLength(2000);
    expect(warnings[1999]).toContain('tx="2000"');
  });

  it('returns an error when the input cannot be read', async () => {
    const handler = new ProcessHandler(new LedgerEngine());
    const input = new Readable({
      read() {
        this.destroy(new Error('disk unavailable'));
      },
    });

    const result = await handler.execute({ input });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toBe('disk unavailable');
  });

  it('returns an error for input that is not valid CSV', async () => {
    const handler = new ProcessHandler(new LedgerEngine());

    const result = await handler.execute({
      input: csv('type,client,tx,amount', 'deposit,1,1,"5'),
    });

    expect(result.isErr()).toBe(true);
  });

  it('returns an error when the header lacks required columns', async () => {
    const handler = new ProcessHandler(new LedgerEngine());

    const result = await handler.execute({ input: csv('kind,client,amount', 'deposit,1,5') });

    expect(result._unsafeUnwrapErr().message).toBe('Missing required CSV column(s): type, tx');
  });
});
