/**
 * Position and holdings type definitions.
 */

import type { ContractRef } from "./market.js";

/** Position as reported by the positions stream (quantity + cost only) */
export interface PositionRecord {
  account: string;
  contract: ContractRef;
  quantity: number;
  averageCost: number;
}

/**
 * Holding with market value and P&L, as reported by the account
 * portfolio stream.
 */
export interface PortfolioItem {
  account: string;
  contract: ContractRef;
  quantity: number;
  marketPrice: number;
  marketValue: number;
  averageCost: number;
  unrealizedPnL: number;
  realizedPnL: number;
}

/** Key for the one-active-record-per-(account, instrument) rule */
export function holdingKey(account: string, conId: number): string {
  return `${account}:${conId}`;
}
