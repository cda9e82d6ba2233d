import { classifyAddress, classifyAddresses, isEarlier } from '../analysis/phishy-classifier';
import { BuyRecord, PHISHY_REASONS, TransferRecord } from '../types';

function transfer(address: string, firstTransferTime: string | null, totalTransferred: number = 100): TransferRecord {
  return { address, firstTransferTime, totalTransferred };
}

function buy(address: string, firstBuyTime: string | undefined, totalBought: number = 100): BuyRecord {
  return { address, firstBuyTime, totalBought };
}

describe('Phishy Classifier', () => {
  describe('isEarlier', () => {
    test('should compare timestamps as instants', () => {
      expect(isEarlier('2026-10-19T10:00:00Z', '2026-10-19T10:00:01Z')).toBe(true);
      expect(isEarlier('2026-10-19T10:00:01Z', '2026-10-19T10:00:00Z')).toBe(false);
      expect(isEarlier('2026-10-19T10:00:00Z', '2026-10-19T10:00:00Z')).toBe(false);
    });

    test('should respect timezone offsets', () => {
      // 10:00+02:00 is 08:00Z
      expect(isEarlier('2026-10-19T10:00:00+02:00', '2026-10-19T09:00:00Z')).toBe(true);
    });

    test('should fall back to string order when a timestamp does not parse', () => {
      expect(isEarlier('block-100', 'block-200')).toBe(true);
      expect(isEarlier('block-200', 'block-100')).toBe(false);
    });
  });

  describe('classifyAddress', () => {
    test('should flag an address that never bought', () => {
      const result = classifyAddress(transfer('0xaaa', '2026-10-19T10:00:00Z', 500), undefined);

      expect(result).toEqual({
        address: '0xaaa',
        firstTransferTime: '2026-10-19T10:00:00Z',
        firstBuyTime: null,
        totalTransferred: 500,
        totalBought: 0,
        transferredWithoutBuy: 500,
        isPhishy: true,
        reason: PHISHY_REASONS.NEVER_BOUGHT,
      });
    });

    test('should flag a transfer that came before the first buy', () => {
      const result = classifyAddress(
        transfer('0xbbb', '2026-10-19T10:00:00Z', 300),
        buy('0xbbb', '2026-10-19T11:00:00Z', 100)
      );

      expect(result.isPhishy).toBe(true);
      expect(result.reason).toBe('Transfer occurred before first buy');
      expect(result.firstBuyTime).toBe('2026-10-19T11:00:00Z');
      expect(result.transferredWithoutBuy).toBe(200);
    });

    test('should treat a buy before the transfer as normal', () => {
      const result = classifyAddress(
        transfer('0xccc', '2026-10-19T10:00:00Z'),
        buy('0xccc', '2026-10-19T09:00:00Z')
      );

      expect(result.isPhishy).toBe(false);
      expect(result.reason).toBeNull();
    });

    test('should treat equal transfer and buy times as normal', () => {
      const result = classifyAddress(
        transfer('0xddd', '2026-10-19T10:00:00Z'),
        buy('0xddd', '2026-10-19T10:00:00Z')
      );

      expect(result.isPhishy).toBe(false);
    });

    test('should flip on a one second difference', () => {
      const transferAt = transfer('0xeee', '2026-10-19T10:00:00Z');

      expect(classifyAddress(transferAt, buy('0xeee', '2026-10-19T10:00:01Z')).isPhishy).toBe(true);
      expect(classifyAddress(transferAt, buy('0xeee', '2026-10-19T09:59:59Z')).isPhishy).toBe(false);
    });

    test('should flag a buy record without a buy time as never bought', () => {
      const result = classifyAddress(transfer('0xfff', '2026-10-19T10:00:00Z', 100), buy('0xfff', undefined, 40));

      expect(result.isPhishy).toBe(true);
      expect(result.reason).toBe(PHISHY_REASONS.NEVER_BOUGHT);
      expect(result.firstBuyTime).toBeNull();
      expect(result.totalBought).toBe(40);
      expect(result.transferredWithoutBuy).toBe(60);
    });

    test('should treat a receiver without a transfer time as normal when it bought', () => {
      const result = classifyAddress(transfer('0x456', null, 100), buy('0x456', '2026-10-19T10:30:00Z', 100));

      expect(result.isPhishy).toBe(false);
      expect(result.reason).toBeNull();
      expect(result.firstTransferTime).toBeNull();
    });

    test('should still flag a receiver without a transfer time that never bought', () => {
      const result = classifyAddress(transfer('0x789', null, 100), undefined);

      expect(result.isPhishy).toBe(true);
      expect(result.reason).toBe(PHISHY_REASONS.NEVER_BOUGHT);
    });

    test('should not clamp transferredWithoutBuy when more was bought than transferred', () => {
      const result = classifyAddress(
        transfer('0x123', '2026-10-19T10:00:00Z', 100),
        buy('0x123', '2026-10-19T10:30:00Z', 250)
      );

      expect(result.isPhishy).toBe(true);
      expect(result.transferredWithoutBuy).toBe(-150);
    });
  });

  describe('classifyAddresses', () => {
    test('should partition transfers and keep their order', () => {
      const transfers = [
        transfer('A', '2026-10-19T10:00:00Z'),
        transfer('B', '2026-10-19T10:01:00Z'),
        transfer('C', '2026-10-19T10:02:00Z'),
        transfer('D', '2026-10-19T10:03:00Z'),
      ];
      const buys = new Map<string, BuyRecord>([
        ['B', buy('B', '2026-10-19T09:00:00Z')],
        ['D', buy('D', '2026-10-19T11:00:00Z')],
      ]);

      const { phishy, normal } = classifyAddresses(transfers, buys);

      expect(phishy.map(r => r.address)).toEqual(['A', 'C', 'D']);
      expect(normal.map(r => r.address)).toEqual(['B']);
    });

    test('should classify every address when the upstream cap is reached', () => {
      const transfers = Array.from({ length: 1000 }, (_, i) =>
        transfer(`addr-${i}`, '2026-10-19T10:00:00Z')
      );
      const buys = new Map<string, BuyRecord>();
      transfers
        .filter((_, i) => i % 2 === 0)
        .forEach(t => buys.set(t.address, buy(t.address, '2026-10-19T09:00:00Z')));

      const { phishy, normal } = classifyAddresses(transfers, buys);

      expect(phishy).toHaveLength(500);
      expect(normal).toHaveLength(500);
      expect(phishy.length + normal.length).toBe(transfers.length);
    });

    test('should return empty partitions for no transfers', () => {
      expect(classifyAddresses([], new Map())).toEqual({ phishy: [], normal: [] });
    });
  });
});
