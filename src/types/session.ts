import type { Logger } from 'winston';
import type { MenuItem } from '../models/menu';
import type { Order, OrderBuilder } from '../models/order';
import type { SessionMetrics } from '../utils/metrics';

export enum SessionState {
  MAIN_MENU = 'main_menu',
  CHEESE_PROMPT = 'cheese_prompt',
  ITEM_SELECTION = 'item_selection',
  PAYMENT_SELECTION = 'payment_selection',
  EXITED = 'exited',
}

// Receives every line of text meant for the user
export type Emit = (text: string) => void;

export interface PendingMenu {
  pizza: MenuItem;
  pasta: MenuItem;
}

export interface SessionData {
  sessionId: string;
  state: SessionState;
  pendingMenu?: PendingMenu;
  orderBuilder: OrderBuilder;
  order: Order;
}

export interface OrderingSessionOptions {
  emit: Emit;
  logger: Logger;
  metrics: SessionMetrics;
  onExit?: () => void;
  sessionId?: string;
  notifyKitchenOnPayment?: boolean;
}
