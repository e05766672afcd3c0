import { formatAmount } from './menu';
import type { Emit } from '../types/session';

export type PaymentMethod = 'cash' | 'credit card';

export interface PaymentStrategy {
  readonly method: PaymentMethod;
  pay(amount: number): void;
}

export class CashPayment implements PaymentStrategy {
  readonly method = 'cash';

  constructor(private readonly emit: Emit) {}

  pay(amount: number): void {
    this.emit(`Paid ${formatAmount(amount)} by cash.`);
  }
}

export class CreditCardPayment implements PaymentStrategy {
  readonly method = 'credit card';

  constructor(private readonly emit: Emit) {}

  pay(amount: number): void {
    this.emit(`Paid ${formatAmount(amount)} by credit card.`);
  }
}

export interface PaymentSelection {
  strategy: PaymentStrategy;
  // True when the code matched no method and cash was picked instead
  defaulted: boolean;
}

export function selectPaymentStrategy(code: number, emit: Emit): PaymentSelection {
  switch (code) {
    case 1:
      return { strategy: new CashPayment(emit), defaulted: false };
    case 2:
      return { strategy: new CreditCardPayment(emit), defaulted: false };
    default:
      return { strategy: new CashPayment(emit), defaulted: true };
  }
}
