import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'winston';
import { addCheese, formatAmount, isDecorated } from '../models/menu';
import { createMenuItem, menuItemKindForNumber } from '../models/menuFactory';
import { Chef, Order, OrderBuilder } from '../models/order';
import { selectPaymentStrategy } from '../models/payment';
import { Emit, OrderingSessionOptions, SessionData, SessionState } from '../types/session';
import { InputPrompt, SessionMetrics } from '../utils/metrics';
import {
  CHEESE_PROMPT_TEXT,
  DEFAULT_PAYMENT_TEXT,
  EMPTY_ORDER_TEXT,
  GOODBYE_TEXT,
  INVALID_CHOICE_TEXT,
  INVALID_INPUT_TEXT,
  INVALID_ITEM_TEXT,
  isYes,
  ITEM_PROMPT_TEXT,
  MAIN_MENU_TEXT,
  MENU_ITEMS_HEADER,
  parseChoice,
  PAYMENT_PROMPT_TEXT,
  UNEXPECTED_ERROR_TEXT,
  WELCOME_TEXT,
} from '../utils/menuText';

/**
 * One run of the ordering dialogue. Input arrives one line at a time through
 * `handleInput`; every reply goes out through the injected `emit`.
 */
export class OrderingSession {
  private readonly emit: Emit;
  private readonly logger: Logger;
  private readonly metrics: SessionMetrics;
  private readonly onExit?: () => void;
  private readonly notifyKitchenOnPayment: boolean;
  private readonly session: SessionData;

  constructor(options: OrderingSessionOptions) {
    this.emit = options.emit;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.onExit = options.onExit;
    this.notifyKitchenOnPayment = options.notifyKitchenOnPayment ?? false;

    const sessionId = options.sessionId ?? uuidv4();
    const orderBuilder = new OrderBuilder();
    const order = new Order(uuidv4(), orderBuilder);
    // The chef only hears about an order when notify() runs
    order.attach(new Chef(this.emit, this.logger));

    this.session = { sessionId, state: SessionState.MAIN_MENU, orderBuilder, order };
  }

  get sessionId(): string {
    return this.session.sessionId;
  }

  get state(): SessionState {
    return this.session.state;
  }

  get orderBuilder(): OrderBuilder {
    return this.session.orderBuilder;
  }

  get order(): Order {
    return this.session.order;
  }

  start() {
    this.emit(WELCOME_TEXT);
    this.emit(MAIN_MENU_TEXT);
    this.logger.info({ sessionId: this.sessionId, message: 'Session started', orderId: this.order.id });
  }

  handleInput(input: string) {
    const state = this.session.state;
    if (state === SessionState.EXITED) {
      this.logger.debug({ sessionId: this.sessionId, message: 'Input after exit ignored', input });
      return;
    }

    this.logger.info({ sessionId: this.sessionId, state, input });

    try {
      switch (state) {
        case SessionState.MAIN_MENU:
          this.handleMainMenu(input);
          break;
        case SessionState.CHEESE_PROMPT:
          this.handleCheesePrompt(input);
          break;
        case SessionState.ITEM_SELECTION:
          this.handleItemSelection(input);
          break;
        case SessionState.PAYMENT_SELECTION:
          this.handlePaymentSelection(input);
          break;
      }
    } catch (err) {
      this.logger.error({ sessionId: this.sessionId, message: 'Error handling input', state, error: err });
      this.emit(UNEXPECTED_ERROR_TEXT);
      this.returnToMainMenu();
      return;
    }

    if (this.session.state === SessionState.MAIN_MENU) {
      this.emit(MAIN_MENU_TEXT);
    }
  }

  private handleMainMenu(input: string) {
    const choice = this.parseOrReject(input, 'main_menu');
    if (choice === undefined) {
      return;
    }

    this.metrics.recordMenuSelection(choice);

    switch (choice) {
      case 1:
        this.showMenu();
        break;
      case 2:
        this.session.state = SessionState.ITEM_SELECTION;
        this.emit(ITEM_PROMPT_TEXT);
        this.logger.info({ sessionId: this.sessionId, message: 'Prompted for item selection' });
        break;
      case 3:
        this.startPayment();
        break;
      case 4:
        this.exit();
        break;
      default:
        this.emit(INVALID_CHOICE_TEXT);
        this.logger.info({ sessionId: this.sessionId, message: 'Unknown main menu choice', choice });
    }
  }

  private showMenu() {
    this.emit(MENU_ITEMS_HEADER);
    this.session.pendingMenu = {
      pizza: createMenuItem('pizza'),
      pasta: createMenuItem('pasta'),
    };
    this.session.state = SessionState.CHEESE_PROMPT;
    this.emit(CHEESE_PROMPT_TEXT);
    this.logger.info({ sessionId: this.sessionId, message: 'Prompted for extra cheese' });
  }

  private handleCheesePrompt(input: string) {
    const pending = this.session.pendingMenu;
    this.session.pendingMenu = undefined;
    this.session.state = SessionState.MAIN_MENU;

    if (!pending) {
      throw new Error('Cheese prompt answered without a pending menu');
    }

    const pizza = isYes(input) ? addCheese(pending.pizza) : pending.pizza;
    this.emitLines(pizza.display());
    if (isDecorated(pizza)) {
      this.emit(`${pizza.name} with toppings - ${formatAmount(pizza.price)}`);
    }
    this.emitLines(pending.pasta.display());
    this.logger.info({ sessionId: this.sessionId, message: 'Displayed menu', extraCheese: isDecorated(pizza) });
  }

  private handleItemSelection(input: string) {
    this.session.state = SessionState.MAIN_MENU;

    const itemNumber = this.parseOrReject(input, 'item_selection');
    if (itemNumber === undefined) {
      return;
    }

    const kind = menuItemKindForNumber(itemNumber);
    if (!kind) {
      this.emit(INVALID_ITEM_TEXT);
      this.logger.info({ sessionId: this.sessionId, message: 'Invalid item number', itemNumber });
      return;
    }

    const item = createMenuItem(kind);
    this.session.orderBuilder.addItem(item);
    this.metrics.recordItemAdded(item.name);
    this.emit(`${item.name} added to order.`);
    this.logger.info({
      sessionId: this.sessionId,
      message: `Added item ${item.name} to order`,
      itemCount: this.session.orderBuilder.itemCount,
    });
  }

  private startPayment() {
    if (this.session.orderBuilder.isEmpty()) {
      this.emit(EMPTY_ORDER_TEXT);
      this.logger.info({ sessionId: this.sessionId, message: 'No order to pay' });
      return;
    }

    this.session.state = SessionState.PAYMENT_SELECTION;
    this.emit(PAYMENT_PROMPT_TEXT);
    this.logger.info({ sessionId: this.sessionId, message: 'Prompted for payment method' });
  }

  private handlePaymentSelection(input: string) {
    this.session.state = SessionState.MAIN_MENU;

    const code = this.parseOrReject(input, 'payment_selection');
    if (code === undefined) {
      return;
    }

    const { strategy, defaulted } = selectPaymentStrategy(code, this.emit);
    if (defaulted) {
      this.emit(DEFAULT_PAYMENT_TEXT);
      this.logger.warn({ sessionId: this.sessionId, message: 'Unknown payment method, using cash', code });
    }

    const total = this.session.orderBuilder.calculateTotal();
    this.emit(`Total Amount: ${formatAmount(total)}`);
    strategy.pay(total);
    this.metrics.recordPayment(strategy.method);
    this.logger.info({ sessionId: this.sessionId, message: 'Payment made', method: strategy.method, total });

    if (this.notifyKitchenOnPayment) {
      this.session.order.notify();
    }
  }

  private exit() {
    this.session.state = SessionState.EXITED;
    this.emit(GOODBYE_TEXT);
    this.logger.info({ sessionId: this.sessionId, message: 'Session exited' });
    this.onExit?.();
  }

  private returnToMainMenu() {
    this.session.state = SessionState.MAIN_MENU;
    this.session.pendingMenu = undefined;
    this.emit(MAIN_MENU_TEXT);
  }

  // Malformed input gets the generic message; the caller falls back to the main menu
  private parseOrReject(input: string, prompt: InputPrompt): number | undefined {
    const value = parseChoice(input);
    if (value === undefined) {
      this.emit(INVALID_INPUT_TEXT);
      this.metrics.recordInvalidInput(prompt);
      this.logger.info({ sessionId: this.sessionId, message: 'Invalid input', prompt, input });
    }
    return value;
  }

  private emitLines(lines: string[]) {
    for (const line of lines) {
      this.emit(line);
    }
  }
}
