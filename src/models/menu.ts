export type MenuItemKind = 'pizza' | 'pasta';

export interface MenuItem {
  readonly name: string;
  // Integer cents, so order totals stay exact to two decimals
  readonly priceCents: number;
  readonly price: number;
  display(): string[];
}

// Shortest decimal form of an amount: 10.99, 19.98, 1.5
export function formatAmount(amount: number): string {
  return `$${amount}`;
}

abstract class BaseMenuItem implements MenuItem {
  abstract readonly name: string;
  abstract readonly priceCents: number;

  get price(): number {
    return this.priceCents / 100;
  }

  display(): string[] {
    return [`${this.name} - ${formatAmount(this.price)}`];
  }
}

export class Pizza extends BaseMenuItem {
  readonly name = 'Pizza';
  readonly priceCents = 1099;
}

export class Pasta extends BaseMenuItem {
  readonly name = 'Pasta';
  readonly priceCents = 899;
}

/**
 * Wraps another menu item and forwards everything to it.
 * Subclasses add their surcharge and display line on top.
 */
export abstract class ToppingDecorator implements MenuItem {
  constructor(protected readonly menuItem: MenuItem) {}

  get name(): string {
    return this.menuItem.name;
  }

  get priceCents(): number {
    return this.menuItem.priceCents;
  }

  get price(): number {
    return this.priceCents / 100;
  }

  display(): string[] {
    return this.menuItem.display();
  }
}

export const CHEESE_SURCHARGE_CENTS = 150;

export class CheeseTopping extends ToppingDecorator {
  get priceCents(): number {
    return this.menuItem.priceCents + CHEESE_SURCHARGE_CENTS;
  }

  display(): string[] {
    return [...super.display(), ' + Cheese'];
  }
}

export function addCheese(item: MenuItem): MenuItem {
  return new CheeseTopping(item);
}

export function isDecorated(item: MenuItem): boolean {
  return item instanceof ToppingDecorator;
}
