import { ethers } from 'ethers';
import { ArithmeticOverflowError, ArrayLengthMismatchError } from '../../middleware/errorHandler';

export const WEI_DECIMALS = 18;

/**
 * Rescales a value with the given number of decimals to 18 decimals.
 * Scaling down floors, dropping sub-wei precision.
 */
export function toWei(value: bigint, decimals: number): bigint {
  const decimalsDiff = WEI_DECIMALS - decimals;
  if (decimalsDiff < 0) {
    return value / 10n ** BigInt(-decimalsDiff);
  }
  const result = value * 10n ** BigInt(decimalsDiff);
  if (result > ethers.MaxUint256) {
    throw new ArithmeticOverflowError(value, decimals);
  }
  return result;
}

export function toWeiBatch(values: bigint[], decimals: number[]): bigint[] {
  if (values.length !== decimals.length) {
    throw new ArrayLengthMismatchError(values.length, decimals.length);
  }
  return values.map((value, i) => toWei(value, decimals[i]));
}
