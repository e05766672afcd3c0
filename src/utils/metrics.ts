import { Counter, Registry } from 'prom-client';

// Anything else typed at the main menu shares one series
const MAIN_MENU_CHOICES = new Set([1, 2, 3, 4]);

export type InputPrompt = 'main_menu' | 'item_selection' | 'payment_selection';

export class SessionMetrics {
  readonly register: Registry;
  private readonly menuSelections: Counter<'choice'>;
  private readonly itemsAdded: Counter<'item'>;
  private readonly payments: Counter<'method'>;
  private readonly invalidInputs: Counter<'prompt'>;

  constructor(register: Registry = new Registry()) {
    this.register = register;
    this.menuSelections = new Counter({
      name: 'menu_selections_total',
      help: 'Main menu choices made',
      labelNames: ['choice'],
      registers: [register],
    });
    this.itemsAdded = new Counter({
      name: 'order_items_added_total',
      help: 'Items appended to the order',
      labelNames: ['item'],
      registers: [register],
    });
    this.payments = new Counter({
      name: 'payments_total',
      help: 'Payments settled',
      labelNames: ['method'],
      registers: [register],
    });
    this.invalidInputs = new Counter({
      name: 'invalid_inputs_total',
      help: 'Lines that could not be parsed as a number',
      labelNames: ['prompt'],
      registers: [register],
    });
  }

  recordMenuSelection(choice: number): void {
    this.menuSelections.inc({ choice: MAIN_MENU_CHOICES.has(choice) ? choice.toString() : 'other' });
  }

  recordItemAdded(item: string): void {
    this.itemsAdded.inc({ item });
  }

  recordPayment(method: string): void {
    this.payments.inc({ method });
  }

  recordInvalidInput(prompt: InputPrompt): void {
    this.invalidInputs.inc({ prompt });
  }

  snapshot(): Promise<string> {
    return this.register.metrics();
  }
}
