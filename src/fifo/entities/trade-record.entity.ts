import Decimal from 'decimal.js';

export enum TradeKind {
  BUY = 'buy',
  SELL = 'sell',
  NOOP = 'noop',           // zero quantity on both sides
}

// One row as it arrives from a CSV file or the JSON API, before coercion.
export type RawTradeRow = Record<string, string | number | null | undefined>;

// Normalized trade row. Quantities are whole shares.
export interface TradeRecord {
  clientCode: string;
  tradeDate: Date;
  segment: string;
  security: string;        // scrip name
  buyQty: number;
  buyPrice: Decimal;
  buyAmount: Decimal | null;
  sellQty: number;
  sellPrice: Decimal;
  sellAmount: Decimal | null;
  orderRef: string;
  position: number;        // zero-based row index in the input
}
