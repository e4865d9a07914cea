import Decimal from 'decimal.js';

// Purchase batch: a single buy or all buys of one security on one date.
// Only the matcher mutates remainingQty/remainingCost.
export interface Lot {
  security: string;
  segment: string;
  tradeDate: Date;
  originalQty: number;
  price: Decimal;          // weighted average when aggregated
  totalCost: Decimal;
  remainingQty: number;
  remainingCost: Decimal;
  clientCode: string;
  orderRef: string;        // "Aggregated-{yyyy-MM-dd}" for aggregated lots
  tradeCount: number;
  position: number;        // earliest source row
}

export interface SellEvent {
  security: string;
  tradeDate: Date;
  quantity: number;
  price: Decimal;          // audit only
  amount: Decimal | null;  // audit only
  orderRef: string;
  position: number;
}
