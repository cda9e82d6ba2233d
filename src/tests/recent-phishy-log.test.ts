import { RecentPhishyLog } from '../services/recent-phishy-log';
import { RecentPhishyEntry } from '../types';

function entry(tokenAddress: string): RecentPhishyEntry {
  return {
    tokenAddress,
    tokenType: 'fourmeme',
    phishyCount: 1,
    timestamp: '2026-10-19T12:00:00.000Z',
    totals: { totalTransferred: 10, totalBought: 0, totalWithoutBuy: 10 },
  };
}

describe('RecentPhishyLog', () => {
  test('should list the most recent entry first', async () => {
    const log = new RecentPhishyLog();

    await log.append(entry('first'));
    await log.append(entry('second'));

    expect(log.list().map(e => e.tokenAddress)).toEqual(['second', 'first']);
  });

  test('should drop the oldest entries past the limit', async () => {
    const log = new RecentPhishyLog(3);

    for (const name of ['a', 'b', 'c', 'd', 'e']) {
      await log.append(entry(name));
    }

    expect(log.size).toBe(3);
    expect(log.list().map(e => e.tokenAddress)).toEqual(['e', 'd', 'c']);
  });

  test('should keep every concurrent append', async () => {
    const log = new RecentPhishyLog();

    await Promise.all(Array.from({ length: 20 }, (_, i) => log.append(entry(`token-${i}`))));

    expect(log.size).toBe(20);
    expect(log.list()[0].tokenAddress).toBe('token-19');
  });

  test('should not expose its internal list', async () => {
    const log = new RecentPhishyLog();
    await log.append(entry('kept'));

    log.list().pop();

    expect(log.size).toBe(1);
  });
});
