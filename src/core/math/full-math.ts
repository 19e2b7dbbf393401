export const Q96 = 1n << 96n;
export const Q192 = 1n << 192n;
export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * floor(a * b / denominator) for non-negative operands.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('mulDiv: division by zero');
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new RangeError('mulDiv: operands must be non-negative');
  }
  return (a * b) / denominator;
}

/**
 * Signed division rounded toward negative infinity.
 * BigInt division truncates toward zero, which biases negative quotients up.
 */
export function floorDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('floorDiv: division by zero');
  }
  const quotient = numerator / denominator;
  const inexact = numerator % denominator !== 0n;
  const negative = numerator < 0n !== denominator < 0n;
  return inexact && negative ? quotient - 1n : quotient;
}
