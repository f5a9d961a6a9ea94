/**
 * Denomination arithmetic.
 *
 * Every denomination is a power of two. Any amount is represented by the
 * minimal multiset of denominations, i.e. the set bits of its binary form.
 */

/** True for 1, 2, 4, 8, … (safe integers only). */
export function isPowerOfTwo(amount: number): boolean {
  if (!Number.isSafeInteger(amount) || amount <= 0) return false;
  // Bitwise ops truncate to 32 bits, so walk down instead.
  let n = amount;
  while (n % 2 === 0) n /= 2;
  return n === 1;
}

/** log2 of a power-of-two amount. Throws for anything else. */
export function denominationOrder(amount: number): number {
  if (!isPowerOfTwo(amount)) {
    throw new Error(`not a power of two: ${amount}`);
  }
  let order = 0;
  let n = amount;
  while (n > 1) {
    n /= 2;
    order++;
  }
  return order;
}

/**
 * Split an amount into its minimal power-of-two denominations, ascending.
 *
 * splitAmount(13) → [1, 4, 8]
 */
export function splitAmount(amount: number): number[] {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new Error(`invalid amount: ${amount}`);
  }
  const parts: number[] = [];
  let remaining = amount;
  let denomination = 1;
  while (remaining > 0) {
    if (remaining % 2 === 1) parts.push(denomination);
    remaining = Math.floor(remaining / 2);
    denomination *= 2;
  }
  return parts;
}

/** Sum of `amount` fields. */
export function sumAmounts(items: ReadonlyArray<{ amount: number }>): number {
  return items.reduce((sum, item) => sum + item.amount, 0);
}

/**
 * Number of blank outputs a wallet should send to receive change of up to
 * `feeReserve` (NUT-08): max(ceil(log2(feeReserve)), 1).
 */
export function blankOutputCount(feeReserve: number): number {
  if (feeReserve <= 0) return 0;
  return Math.max(Math.ceil(Math.log2(feeReserve)), 1);
}
