export type StockStatus = 'in_stock' | 'low_stock' | 'out_of_stock';

export interface PricedLine {
  unitPrice: number;
  quantity: number;
}

/** Rounds to cents, half away from zero. */
export function roundMoney(amount: number): number {
  // toPrecision strips binary noise such as 1000.4999999999999
  const cents = Math.round(Number((Math.abs(amount) * 100).toPrecision(15)));
  return (Math.sign(amount) * cents) / 100;
}

export function lineTotal(unitPrice: number, quantity: number): number {
  return roundMoney(unitPrice * quantity);
}

export function subtotal(lines: readonly PricedLine[]): number {
  return roundMoney(
    lines.reduce((sum, line) => sum + lineTotal(line.unitPrice, line.quantity), 0),
  );
}

export function discountAmount(amount: number, percent: number): number {
  if (percent <= 0) {
    return 0;
  }
  return roundMoney((amount * Math.min(percent, 100)) / 100);
}

export function applyDiscount(amount: number, percent: number): number {
  return Math.max(0, roundMoney(amount - discountAmount(amount, percent)));
}

export function stockStatus(quantity: number, lowStockThreshold: number): StockStatus {
  if (quantity <= 0) {
    return 'out_of_stock';
  }
  return quantity <= lowStockThreshold ? 'low_stock' : 'in_stock';
}
