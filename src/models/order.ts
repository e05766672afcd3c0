import type { Logger } from 'winston';
import type { MenuItem } from './menu';
import type { Emit } from '../types/session';

export class OrderBuilder {
  private items: MenuItem[] = [];

  addItem(item: MenuItem): void {
    this.items.push(item);
  }

  calculateTotal(): number {
    const totalCents = this.items.reduce((sum, item) => sum + item.priceCents, 0);
    return totalCents / 100;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  get itemCount(): number {
    return this.items.length;
  }

  getItems(): readonly MenuItem[] {
    return this.items;
  }
}

export interface OrderObserver {
  update(order: Order): void;
}

/**
 * Notification channel for an order. Items and total are read live
 * from the builder the order was opened on.
 */
export class Order {
  private observers: OrderObserver[] = [];

  constructor(
    readonly id: string,
    private readonly builder: OrderBuilder
  ) {}

  get items(): readonly MenuItem[] {
    return this.builder.getItems();
  }

  get total(): number {
    return this.builder.calculateTotal();
  }

  attach(observer: OrderObserver): void {
    this.observers.push(observer);
  }

  notify(): void {
    for (const observer of this.observers) {
      observer.update(this);
    }
  }
}

export class Chef implements OrderObserver {
  constructor(
    private readonly emit: Emit,
    private readonly logger: Logger
  ) {}

  update(order: Order): void {
    this.emit('Chef: New order received.');
    this.logger.info({ orderId: order.id, message: 'Chef notified', itemCount: order.items.length, total: order.total });
  }
}
