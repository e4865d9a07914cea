import Decimal from 'decimal.js';

// Holdings of one security across its remaining lots.
export interface SecuritySummary {
  security: string;
  totalShares: number;
  totalCost: Decimal;
  earliestPurchase: Date | null;   // null when no lots remain
  latestPurchase: Date | null;
  lotCount: number;
  averageCost: Decimal;            // zero when totalShares is zero
}
