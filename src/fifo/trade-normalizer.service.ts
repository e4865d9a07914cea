import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { RawTradeRow, TradeKind, TradeRecord } from './entities/trade-record.entity';
import { Diagnostics, MalformedRowIssue } from './entities/diagnostics.entity';
import { parseDecimal } from '../common/utils/decimal.util';
import { parseTradeDate } from '../common/utils/date.util';

// First alias is the canonical CSV column; camelCase keys come from the JSON API.
const FIELD_ALIASES = {
  clientCode: ['ClientCode', 'Client Code', 'clientCode'],
  tradeDate: ['TradeDate', 'tradeDate'],
  segment: ['Segment', 'segment'],
  security: ['ScripName', 'scripName'],
  buyQty: ['BuyQty', 'buyQty'],
  buyPrice: ['BuyPrice', 'buyPrice'],
  buyAmount: ['BuyAmount', 'buyAmount'],
  sellQty: ['SellQty', 'sellQty'],
  sellPrice: ['SellPrice', 'sellPrice'],
  sellAmount: ['SellAmount', 'sellAmount'],
  orderRef: ['OrderNo', 'orderNo'],
} satisfies Record<string, string[]>;

type TradeField = keyof typeof FIELD_ALIASES;

type FieldResult<T> = { valid: true; value: T } | { valid: false; reason: string };

export type NormalizeResult =
  | { ok: true; kind: TradeKind; record: TradeRecord }
  | { ok: false; issue: MalformedRowIssue };

export interface ClassifiedTrade {
  kind: TradeKind.BUY | TradeKind.SELL;
  record: TradeRecord;
}

const ZERO = new Decimal(0);

function readField(raw: RawTradeRow, field: TradeField): string | null {
  for (const key of FIELD_ALIASES[field]) {
    const value = raw[key];
    if (value === null || value === undefined) {
      continue;
    }
    const text = String(value).trim();
    return text === '' ? null : text;
  }
  return null;
}

function columnName(field: TradeField): string {
  return FIELD_ALIASES[field][0];
}

// Empty quantity means zero shares on that side.
function readQuantity(raw: RawTradeRow, field: TradeField): FieldResult<number> {
  const text = readField(raw, field);
  if (text === null) {
    return { valid: true, value: 0 };
  }
  const parsed = parseDecimal(text);
  if (!parsed) {
    return { valid: false, reason: `non-numeric ${columnName(field)} "${text}"` };
  }
  if (parsed.isNegative()) {
    return { valid: false, reason: `negative ${columnName(field)} "${text}"` };
  }
  if (!parsed.isInteger()) {
    return { valid: false, reason: `fractional ${columnName(field)} "${text}"` };
  }
  return { valid: true, value: parsed.toNumber() };
}

// Empty amount means absent. Buy prices may not be negative; sell prices are audit only.
function readAmount(raw: RawTradeRow, field: TradeField, allowNegative: boolean): FieldResult<Decimal | null> {
  const text = readField(raw, field);
  if (text === null) {
    return { valid: true, value: null };
  }
  const parsed = parseDecimal(text);
  if (!parsed) {
    return { valid: false, reason: `non-numeric ${columnName(field)} "${text}"` };
  }
  if (!allowNegative && parsed.isNegative()) {
    return { valid: false, reason: `negative ${columnName(field)} "${text}"` };
  }
  return { valid: true, value: parsed };
}

/**
 * Validates and coerces raw rows into trade records.
 * Bad rows are reported, never thrown.
 */
@Injectable()
export class TradeNormalizerService {
  normalize(raw: RawTradeRow, position: number): NormalizeResult {
    const row = position + 1;
    const fail = (reason: string): NormalizeResult => ({ ok: false, issue: { row, reason } });

    const security = readField(raw, 'security');
    if (!security) {
      return fail('missing ScripName');
    }

    const dateText = readField(raw, 'tradeDate');
    if (!dateText) {
      return fail('missing TradeDate');
    }
    const tradeDate = parseTradeDate(dateText);
    if (!tradeDate) {
      return fail(`unparseable TradeDate "${dateText}"`);
    }

    const buyQty = readQuantity(raw, 'buyQty');
    if (!buyQty.valid) return fail(buyQty.reason);
    const sellQty = readQuantity(raw, 'sellQty');
    if (!sellQty.valid) return fail(sellQty.reason);
    const buyPrice = readAmount(raw, 'buyPrice', false);
    if (!buyPrice.valid) return fail(buyPrice.reason);
    const buyAmount = readAmount(raw, 'buyAmount', true);
    if (!buyAmount.valid) return fail(buyAmount.reason);
    const sellPrice = readAmount(raw, 'sellPrice', true);
    if (!sellPrice.valid) return fail(sellPrice.reason);
    const sellAmount = readAmount(raw, 'sellAmount', true);
    if (!sellAmount.valid) return fail(sellAmount.reason);

    if (buyQty.value > 0 && sellQty.value > 0) {
      return fail('both BuyQty and SellQty are positive');
    }

    let kind = TradeKind.NOOP;
    let resolvedBuyPrice = buyPrice.value ?? ZERO;

    if (buyQty.value > 0) {
      kind = TradeKind.BUY;
      if (buyPrice.value === null) {
        // price derived from the amount when only the amount was exported
        if (buyAmount.value === null || !buyAmount.value.greaterThan(0)) {
          return fail('missing BuyPrice');
        }
        resolvedBuyPrice = buyAmount.value.dividedBy(buyQty.value);
      }
    } else if (sellQty.value > 0) {
      kind = TradeKind.SELL;
    }

    const record: TradeRecord = {
      clientCode: readField(raw, 'clientCode') ?? '',
      tradeDate,
      segment: readField(raw, 'segment') ?? '',
      security,
      buyQty: buyQty.value,
      buyPrice: resolvedBuyPrice,
      buyAmount: buyAmount.value,
      sellQty: sellQty.value,
      sellPrice: sellPrice.value ?? ZERO,
      sellAmount: sellAmount.value,
      orderRef: readField(raw, 'orderRef') ?? '',
      position,
    };

    return { ok: true, kind, record };
  }

  /**
   * Normalizes a whole input table, keeping buys and sells in row order.
   * Malformed rows and noops are recorded on the diagnostics and left out.
   */
  normalizeAll(rows: RawTradeRow[], diagnostics: Diagnostics): ClassifiedTrade[] {
    const trades: ClassifiedTrade[] = [];

    rows.forEach((raw, position) => {
      const result = this.normalize(raw, position);
      if (!result.ok) {
        diagnostics.recordMalformed(result.issue);
        return;
      }
      if (result.kind === TradeKind.NOOP) {
        diagnostics.recordNoop();
        return;
      }
      trades.push({ kind: result.kind, record: result.record });
    });

    return trades;
  }
}
