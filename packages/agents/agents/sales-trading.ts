// Sales & Trading — client order handling, opportunity screening, inventory bias

import { z } from 'zod';
import type { ClientRequestEvent, SequencedEvent, TradingOpportunityEvent } from '../types/broker-events.js';
import type { Message } from '../types/coordination.js';
import type { DecisionInput, DecisionOutput } from '../types/decision.js';
import { BaseDepartment, listOf } from './base-department.js';
import { OutlookSchema } from './research.js';

export const VWAP_THRESHOLD = 10_000;
/** Orders above this size need a compliance review before execution. */
export const LARGE_ORDER_THRESHOLD = 50_000;
export const MAX_EXECUTABLE_SPREAD = 0.005;

const OrderSchema = z.object({
  symbol: z.string().min(1),
  side: z.enum(['buy', 'sell']).default('buy'),
  quantity: z.number().positive(),
});

export class SalesTradingDesk extends BaseDepartment {
  constructor() {
    super('sales_trading');
  }

  protected onEvent(event: SequencedEvent, input: DecisionInput): DecisionOutput {
    switch (event.type) {
      case 'client_request':
        return this.takeOrder(event, input);

      case 'market_update': {
        const sentiment = event.data.market_sentiment;
        const bias = sentiment === 'positive' ? 'long' : sentiment === 'negative' ? 'short' : 'flat';
        return this.opine({ action: 'adjust_inventory', bias }, { confidence: 0.6 }, { state: { bias } });
      }

      case 'trading_opportunity':
        return this.screen(event);

      case 'regulatory_announcement':
        return {};
    }
  }

  protected onMessage(message: Message, input: DecisionInput): DecisionOutput {
    switch (message.topic) {
      case 'prepare_distribution': {
        const distributions = listOf(input.state, 'distributions');
        return { state: { distributions: [...distributions, { event_id: input.event.id, ...message.payload }] } };
      }
      case 'research_note': {
        const outlook = OutlookSchema.safeParse(message.payload.outlook);
        return outlook.success ? { state: { research_outlook: outlook.data } } : {};
      }
      default:
        return super.onMessage(message, input);
    }
  }

  private takeOrder(event: ClientRequestEvent, input: DecisionInput): DecisionOutput {
    const parsed = OrderSchema.safeParse(event.data ?? {});
    if (!parsed.success) {
      return this.opine({ action: 'reject_order', reason: 'order details are incomplete' }, { confidence: 0.9 });
    }

    const order = parsed.data;
    const algo = order.quantity >= VWAP_THRESHOLD ? 'vwap' : 'market';
    const orders = listOf(input.state, 'orders');
    return this.opine(
      { action: 'execute_order', ...order, algo },
      { confidence: 0.8 },
      {
        messages: order.quantity > LARGE_ORDER_THRESHOLD
          ? [{ to: 'risk_compliance', topic: 'request_review', payload: { symbol: order.symbol, quantity: order.quantity } }]
          : [],
        state: { orders: [...orders, { event_id: event.id, ...order, algo }] },
      },
    );
  }

  /** Tight spread and two-sided depth: trade in the direction of the heavier book. */
  private screen(event: TradingOpportunityEvent): DecisionOutput {
    const { symbol, current_price, bid_ask_spread, market_depth } = event.data;
    const bidQty = market_depth.bids.reduce((sum, l) => sum + l.quantity, 0);
    const askQty = market_depth.asks.reduce((sum, l) => sum + l.quantity, 0);

    if (bid_ask_spread / current_price > MAX_EXECUTABLE_SPREAD) {
      return this.opine({ action: 'pass', symbol, reason: 'spread too wide' }, { confidence: 0.7 });
    }
    if (bidQty === 0 || askQty === 0) {
      return this.opine({ action: 'pass', symbol, reason: 'one-sided book' }, { confidence: 0.7 });
    }
    return this.opine({ action: 'execute', symbol, side: bidQty >= askQty ? 'buy' : 'sell' }, { confidence: 0.75 });
  }
}
