/**
 * tg-relay — Relay Types
 */

import type { ChatId } from '../config/types.js';
import type { DeliveryResult } from '../telegram/types.js';

/** Where a formatted message was sent. */
export type DeliveryTarget = 'origin' | 'log';

export interface Delivery {
  target: DeliveryTarget;
  chatId: ChatId;
  result: DeliveryResult;
}

export type SkipReason = 'no-text' | 'no-chat';

export type ForwardResult =
  | { handled: false; reason: SkipReason }
  | { handled: true; formatted: string; deliveries: Delivery[] };
