import { ceilDiv, floorToNearest1000, fractionsEqual, roundToNearest1000, sharePct } from '../../utils/math';

describe('roundToNearest1000', () => {
  it('should round down below the half', () => {
    expect(roundToNearest1000(12400)).toBe(12000);
  });

  it('should round up above the half', () => {
    expect(roundToNearest1000(12600)).toBe(13000);
  });

  it('should round halves up', () => {
    expect(roundToNearest1000(12500)).toBe(13000);
  });

  it('should leave multiples of 1000 unchanged', () => {
    expect(roundToNearest1000(45000)).toBe(45000);
  });

  it('should return 0 for small amounts', () => {
    expect(roundToNearest1000(0)).toBe(0);
    expect(roundToNearest1000(499)).toBe(0);
  });
});

describe('floorToNearest1000', () => {
  it('should always round down', () => {
    expect(floorToNearest1000(1500)).toBe(1000);
    expect(floorToNearest1000(93999)).toBe(93000);
    expect(floorToNearest1000(999)).toBe(0);
  });
});

describe('ceilDiv', () => {
  it('should round partial periods up', () => {
    expect(ceilDiv(10000, 3000)).toBe(4);
  });

  it('should not add a period for an exact division', () => {
    expect(ceilDiv(9000, 3000)).toBe(3);
  });

  it('should return 1 when one period covers the amount', () => {
    expect(ceilDiv(5000, 16000)).toBe(1);
  });
});

describe('sharePct', () => {
  it('should return the share rounded to one decimal', () => {
    expect(sharePct(140000, 1000000)).toBe(14);
    expect(sharePct(1, 3)).toBe(33.3);
  });

  it('should return 0 for a zero total', () => {
    expect(sharePct(0, 0)).toBe(0);
  });
});

describe('fractionsEqual', () => {
  it('should treat floating point sums as equal', () => {
    expect(fractionsEqual(0.15 + 0.1 + 0.05, 0.3)).toBe(true);
  });

  it('should reject real differences', () => {
    expect(fractionsEqual(0.31, 0.3)).toBe(false);
  });
});
