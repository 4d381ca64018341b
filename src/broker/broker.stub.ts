import { Fill, OrderPlacement, OrderPreview, TradeOrder, TradeSide } from '../core/types';
import { MarketDataService } from '../data/marketData.types';
import { hashString, round } from '../core/utils';
import { CONTRACT_MULTIPLIER, daysBetween, estimatePremium } from '../execution/optionPricing';
import { Broker } from './broker.types';

export interface StubBrokerConfig {
  slippageBps: number;
  commissionPerTradeUSD: number;
}

interface PendingOrder {
  symbol: string;
  side: TradeSide;
  quantity: number;
  price: number;
  multiplier: number;
}

/**
 * Paper broker. Orders fill in full at the quoted price moved against the
 * trader by the configured slippage; nothing leaves the process.
 */
export class StubBroker implements Broker {
  private config: StubBrokerConfig;
  private marketData: MarketDataService;
  private pending: Record<string, PendingOrder> = {};
  private sequence = 0;

  constructor(config: StubBrokerConfig, marketData: MarketDataService) {
    this.config = config;
    this.marketData = marketData;
  }

  private async fillPrice(order: TradeOrder, asOf: string): Promise<number> {
    const quote = await this.marketData.getQuote(order.symbol, asOf);
    const slip = order.side === 'BUY' ? 1 + this.config.slippageBps / 10000 : 1 - this.config.slippageBps / 10000;
    if (order.instrument === 'option' && order.option) {
      const days = daysBetween(asOf, order.option.expiry);
      return round(estimatePremium(quote.price, order.option.strike, order.option.right, days) * slip, 4);
    }
    const reference = order.side === 'BUY' ? quote.ask : quote.bid;
    const px = round(reference * slip, 4);
    // A limit order never fills through its limit on paper.
    if (order.limitPrice !== undefined && (order.orderType === 'LIMIT' || order.orderType === 'STOP_LIMIT')) {
      return order.side === 'BUY' ? Math.min(px, order.limitPrice) : Math.max(px, order.limitPrice);
    }
    return px;
  }

  async previewOrder(order: TradeOrder, asOf: string): Promise<OrderPreview> {
    if (!Number.isInteger(order.quantity) || order.quantity <= 0) {
      throw new Error(`Invalid quantity ${order.quantity} for ${order.symbol}`);
    }
    const price = await this.fillPrice(order, asOf);
    const multiplier = order.instrument === 'option' ? CONTRACT_MULTIPLIER : 1;
    return {
      symbol: order.symbol,
      quantity: order.quantity,
      estimatedCost: round(price * order.quantity * multiplier, 2),
      fees: this.config.commissionPerTradeUSD
    };
  }

  async placeOrder(order: TradeOrder, asOf: string): Promise<OrderPlacement> {
    const preview = await this.previewOrder(order, asOf);
    this.sequence += 1;
    const orderId = `ord-${order.symbol}-${hashString(`${order.symbol}-${asOf}-${this.sequence}`)}`;
    const multiplier = order.instrument === 'option' ? CONTRACT_MULTIPLIER : 1;
    this.pending[orderId] = {
      symbol: order.symbol,
      side: order.side,
      quantity: order.quantity,
      price: preview.estimatedCost / (order.quantity * multiplier),
      multiplier
    };
    return { ...preview, orderId };
  }

  async getFills(orderIds: string[], asOf: string): Promise<Fill[]> {
    const fills: Fill[] = [];
    const ts = asOf.includes('T') ? new Date(asOf) : new Date(`${asOf}T16:00:00Z`);
    for (const id of orderIds) {
      const pending = this.pending[id];
      if (!pending) continue;
      fills.push({
        orderId: id,
        symbol: pending.symbol,
        side: pending.side,
        quantity: pending.quantity,
        price: round(pending.price, 4),
        notional: round(pending.price * pending.quantity * pending.multiplier, 2),
        timestamp: ts.toISOString()
      });
      delete this.pending[id];
    }
    return fills;
  }

  async cancelOrder(orderId: string): Promise<void> {
    delete this.pending[orderId];
  }
}
