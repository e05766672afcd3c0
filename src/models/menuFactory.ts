import { MenuItem, MenuItemKind, Pasta, Pizza } from './menu';

export interface MenuItemFactory {
  createMenuItem(): MenuItem;
}

export class PizzaFactory implements MenuItemFactory {
  createMenuItem(): MenuItem {
    return new Pizza();
  }
}

export class PastaFactory implements MenuItemFactory {
  createMenuItem(): MenuItem {
    return new Pasta();
  }
}

const factories: Record<MenuItemKind, MenuItemFactory> = {
  pizza: new PizzaFactory(),
  pasta: new PastaFactory(),
};

// Item numbers as offered by the "add item" prompt
const itemNumbers = new Map<number, MenuItemKind>([
  [1, 'pizza'],
  [2, 'pasta'],
]);

export function createMenuItem(kind: MenuItemKind): MenuItem {
  return factories[kind].createMenuItem();
}

export function menuItemKindForNumber(itemNumber: number): MenuItemKind | undefined {
  return itemNumbers.get(itemNumber);
}
