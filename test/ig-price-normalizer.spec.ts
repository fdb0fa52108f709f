import { describe, expect, it } from 'vitest';
import { normalizationFactor, normalizePrice } from '@libs/market-data';

describe('IG price normalizer', () => {
  it('scales yen pairs by 100', () => {
    expect(normalizePrice(15000, 'CS.D.USDJPY.TODAY.IP', 'USDJPY=X')).toBe(150);
  });

  it('scales other currency pairs by 10000', () => {
    expect(normalizePrice(108500, 'CS.D.EURUSD.TODAY.IP', 'EURUSD=X')).toBe(10.85);
    expect(normalizationFactor('CS.D.GBPUSD.CFD.IP', 'GBPUSD')).toBe(10000);
  });

  it('leaves metals quoted on currency epics unscaled', () => {
    expect(normalizationFactor('CS.D.USCGC.TODAY.IP', 'GOLD')).toBe(1);
    expect(normalizePrice(192345, 'CS.D.USCGC.TODAY.IP', 'GOLD')).toBe(192345);
  });

  it('leaves indices and commodities unscaled', () => {
    expect(normalizePrice(192345, 'IX.D.FTSE.DAILY.IP', '^FTSE')).toBe(192345);
    expect(normalizationFactor('CC.D.CL.USS.IP', 'CL=F')).toBe(1);
  });

  it('converts share prices from cents', () => {
    expect(normalizePrice(19234, 'UA.D.AAPL.DAILY.IP', 'AAPL')).toBe(192.34);
  });

  it('falls back to 1 for unknown epic families', () => {
    expect(normalizationFactor('ZZ.D.UNKNOWN.IP', 'ZZZ')).toBe(1);
  });
});
