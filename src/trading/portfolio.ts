/**
 * Portfolio ledger: positions and holdings per (account, instrument).
 *
 * Two gateway feeds land here. Position batches carry quantity and cost;
 * portfolio items add market value and P&L. Each keeps at most one active
 * record per (account, conId), and a zero quantity closes the record.
 */

import { componentLogger } from "../utils/logger.js";
import { holdingKey, type PortfolioItem, type PositionRecord } from "../types/portfolio.js";

const log = componentLogger("portfolio");

export class Portfolio {
  private readonly positionsByKey = new Map<string, PositionRecord>();
  private readonly itemsByKey = new Map<string, PortfolioItem>();

  /** Apply a batch from the positions stream */
  updatePositions(batch: PositionRecord[]): void {
    for (const position of batch) {
      const key = holdingKey(position.account, position.contract.conId);
      if (position.quantity === 0) {
        if (this.positionsByKey.delete(key)) {
          log.info(`Position closed: ${position.contract.symbol} (${position.account})`);
        }
        continue;
      }
      this.positionsByKey.set(key, { ...position });
    }
    log.debug(`Positions updated (${batch.length} in batch, ${this.positionsByKey.size} active)`);
  }

  /** Apply one update from the portfolio stream */
  updatePortfolioItem(item: PortfolioItem): void {
    const key = holdingKey(item.account, item.contract.conId);
    if (item.quantity === 0) {
      if (this.itemsByKey.delete(key)) {
        log.info(`Holding closed: ${item.contract.symbol} (${item.account})`);
      }
      return;
    }
    this.itemsByKey.set(key, { ...item });
    log.debug(
      `Holding ${item.contract.symbol}: qty ${item.quantity}, ` +
      `mktVal $${item.marketValue.toFixed(2)}, uPnL $${item.unrealizedPnL.toFixed(2)}`
    );
  }

  position(account: string, conId: number): PositionRecord | undefined {
    return this.positionsByKey.get(holdingKey(account, conId));
  }

  item(account: string, conId: number): PortfolioItem | undefined {
    return this.itemsByKey.get(holdingKey(account, conId));
  }

  positions(): PositionRecord[] {
    return Array.from(this.positionsByKey.values());
  }

  items(): PortfolioItem[] {
    return Array.from(this.itemsByKey.values());
  }

  /** Accounts with at least one active holding or position */
  accounts(): string[] {
    const accounts = new Set<string>();
    for (const position of this.positionsByKey.values()) accounts.add(position.account);
    for (const item of this.itemsByKey.values()) accounts.add(item.account);
    return Array.from(accounts);
  }

  totalMarketValue(account?: string): number {
    return this.items()
      .filter((item) => account === undefined || item.account === account)
      .reduce((sum, item) => sum + item.marketValue, 0);
  }

  totalUnrealizedPnL(account?: string): number {
    return this.items()
      .filter((item) => account === undefined || item.account === account)
      .reduce((sum, item) => sum + item.unrealizedPnL, 0);
  }
}
