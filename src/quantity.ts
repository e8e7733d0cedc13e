/**
 * Quantity
 * "all" or a positive count; used to limit report rows
 */

import { QuantityError } from './errors';

export type Quantity = { kind: 'all' } | { kind: 'some'; count: number };

export const ALL: Quantity = { kind: 'all' };

export function parseQuantity(input: string): Quantity {
  if (/^\+?\d+$/.test(input)) {
    const count = Number(input);
    if (count === 0) {
      throw new QuantityError({ code: 'Zero' });
    }
    return { kind: 'some', count };
  }

  if (input.toLowerCase() === 'all') {
    return ALL;
  }

  throw new QuantityError({ code: 'Unknown', input });
}

export function formatQuantity(quantity: Quantity): string {
  return quantity.kind === 'all' ? 'all' : String(quantity.count);
}

/** Last `quantity` items, or all of them */
export function takeLast<T>(items: T[], quantity: Quantity): T[] {
  return quantity.kind === 'all' ? items : items.slice(-quantity.count);
}
