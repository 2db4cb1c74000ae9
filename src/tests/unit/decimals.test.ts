import { ethers } from 'ethers';
import { toWei, toWeiBatch } from '../../services/feeds/decimals';
import { ArithmeticOverflowError, ArrayLengthMismatchError } from '../../middleware/errorHandler';

describe('toWei', () => {
  it('should scale up values with fewer than 18 decimals', () => {
    expect(toWei(123456n, 4)).toBe(123456n * 10n ** 14n);
    expect(toWei(7n, 18)).toBe(7n);
  });

  it('should scale up values with negative decimals', () => {
    expect(toWei(12345678n, -2)).toBe(12345678n * 10n ** 20n);
  });

  it('should floor when scaling down', () => {
    expect(toWei(98765n, 20)).toBe(987n);
    expect(toWei(99n, 20)).toBe(0n);
  });

  it('should accept the largest value that fits', () => {
    expect(toWei(ethers.MaxUint256, 18)).toBe(ethers.MaxUint256);
  });

  it('should reject results above the uint256 range', () => {
    expect(() => toWei(ethers.MaxUint256, 17)).toThrow(ArithmeticOverflowError);
    expect(() => toWei(2n ** 200n, -127)).toThrow(ArithmeticOverflowError);
  });

  it('should convert batches element-wise', () => {
    expect(toWeiBatch([1n, 98765n], [0, 20])).toEqual([10n ** 18n, 987n]);
  });

  it('should reject batches of different lengths', () => {
    expect(() => toWeiBatch([1n, 2n], [0])).toThrow(ArrayLengthMismatchError);
  });
});
