import {
  DEFAULT_ALLOCATION_TABLE,
  DEFAULT_ALLOCATION_TABLE_INPUT,
  createAllocationTable,
  getLeadFund,
  getMarketFunds,
} from '../../config/allocationTable';
import { InvalidInputError } from '../../utils/errors';

describe('DEFAULT_ALLOCATION_TABLE', () => {
  it('should split 30/70 between home and foreign', () => {
    expect(DEFAULT_ALLOCATION_TABLE.marketRatios).toEqual({ HOME: 0.3, FOREIGN: 0.7 });
  });

  it('should cap the tax-advantaged bucket at 100,000 on global equity', () => {
    expect(DEFAULT_ALLOCATION_TABLE.taxAdvantagedCap).toBe(100000);
    expect(DEFAULT_ALLOCATION_TABLE.taxSplitFund).toBe('global_stock');
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(DEFAULT_ALLOCATION_TABLE)).toBe(true);
    expect(Object.isFrozen(DEFAULT_ALLOCATION_TABLE.funds)).toBe(true);
    expect(Object.isFrozen(DEFAULT_ALLOCATION_TABLE.funds.jp_stock)).toBe(true);
  });
});

describe('createAllocationTable', () => {
  it('should throw InvalidInputError when fractions do not sum to 1', () => {
    const input = {
      ...DEFAULT_ALLOCATION_TABLE_INPUT,
      funds: {
        ...DEFAULT_ALLOCATION_TABLE_INPUT.funds,
        os_bond: { market: 'FOREIGN' as const, fraction: 0.1, label: 'Developed-market bond' },
      },
    };

    expect(() => createAllocationTable(input)).toThrow(InvalidInputError);
  });

  it('should accept a custom table that adds up', () => {
    const table = createAllocationTable({
      ...DEFAULT_ALLOCATION_TABLE_INPUT,
      taxAdvantagedCap: 200000,
    });
    expect(table.taxAdvantagedCap).toBe(200000);
  });
});

describe('getMarketFunds', () => {
  it('should list funds of a market in enumeration order', () => {
    expect(getMarketFunds(DEFAULT_ALLOCATION_TABLE, 'HOME')).toEqual(['jp_stock', 'jp_reit', 'jp_bond']);
    expect(getMarketFunds(DEFAULT_ALLOCATION_TABLE, 'FOREIGN')).toEqual([
      'global_stock',
      'us_stock',
      'os_reit',
      'os_bond',
    ]);
  });
});

describe('getLeadFund', () => {
  it('should return the largest-fraction fund of each market', () => {
    expect(getLeadFund(DEFAULT_ALLOCATION_TABLE, 'HOME')).toBe('jp_stock');
    expect(getLeadFund(DEFAULT_ALLOCATION_TABLE, 'FOREIGN')).toBe('global_stock');
  });

  it('should take the first fund in enumeration order on a tie', () => {
    const table = createAllocationTable({
      ...DEFAULT_ALLOCATION_TABLE_INPUT,
      funds: {
        ...DEFAULT_ALLOCATION_TABLE_INPUT.funds,
        jp_stock: { market: 'HOME', fraction: 0.1, label: 'Japan equity' },
        jp_reit: { market: 'HOME', fraction: 0.1, label: 'Japan REIT' },
        jp_bond: { market: 'HOME', fraction: 0.1, label: 'Japan bond' },
      },
    });
    expect(getLeadFund(table, 'HOME')).toBe('jp_stock');
  });
});
