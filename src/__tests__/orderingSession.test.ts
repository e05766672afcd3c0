import { OrderingSession } from '../services/orderingSession';
import { SessionState } from '../types/session';
import { createLogger } from '../utils/logger';
import { SessionMetrics } from '../utils/metrics';
import {
  CHEESE_PROMPT_TEXT,
  DEFAULT_PAYMENT_TEXT,
  EMPTY_ORDER_TEXT,
  GOODBYE_TEXT,
  INVALID_CHOICE_TEXT,
  INVALID_INPUT_TEXT,
  INVALID_ITEM_TEXT,
  ITEM_PROMPT_TEXT,
  MAIN_MENU_TEXT,
  MENU_ITEMS_HEADER,
  PAYMENT_PROMPT_TEXT,
  UNEXPECTED_ERROR_TEXT,
  WELCOME_TEXT,
} from '../utils/menuText';

describe('OrderingSession', () => {
  const logger = createLogger({ level: 'debug', silent: true });
  let emit: jest.Mock<void, [string]>;
  let onExit: jest.Mock<void, []>;
  let metrics: SessionMetrics;
  let session: OrderingSession;

  const output = () => emit.mock.calls.map(([text]) => text);

  const send = (...lines: string[]) => {
    for (const line of lines) {
      session.handleInput(line);
    }
  };

  const createSession = (notifyKitchenOnPayment = false) => {
    session = new OrderingSession({
      emit,
      logger,
      metrics,
      onExit,
      sessionId: 'test-session',
      notifyKitchenOnPayment,
    });
    session.start();
    emit.mockClear();
  };

  beforeEach(() => {
    emit = jest.fn();
    onExit = jest.fn();
    metrics = new SessionMetrics();
    createSession();
  });

  test('should greet and show the main menu on start', () => {
    const fresh = new OrderingSession({ emit, logger, metrics });
    fresh.start();

    expect(output()).toEqual([WELCOME_TEXT, MAIN_MENU_TEXT]);
    expect(fresh.state).toBe(SessionState.MAIN_MENU);
  });

  test('should display the menu without cheese when the answer is N', () => {
    send('1');
    expect(output()).toEqual([MENU_ITEMS_HEADER, CHEESE_PROMPT_TEXT]);
    expect(session.state).toBe(SessionState.CHEESE_PROMPT);

    emit.mockClear();
    send('N');

    expect(output()).toEqual(['Pizza - $10.99', 'Pasta - $8.99', MAIN_MENU_TEXT]);
    expect(session.state).toBe(SessionState.MAIN_MENU);
  });

  test('should add a cheese line and the surcharge when the answer is y', () => {
    send('1');
    emit.mockClear();
    send('y');

    expect(output()).toEqual([
      'Pizza - $10.99',
      ' + Cheese',
      'Pizza with toppings - $12.49',
      'Pasta - $8.99',
      MAIN_MENU_TEXT,
    ]);
    expect(session.orderBuilder.isEmpty()).toBe(true);
  });

  test('should add pizza and pasta and pay 19.98 by cash', () => {
    send('2', '1', '2', '2', '3', '1');

    expect(output()).toEqual([
      ITEM_PROMPT_TEXT,
      'Pizza added to order.',
      MAIN_MENU_TEXT,
      ITEM_PROMPT_TEXT,
      'Pasta added to order.',
      MAIN_MENU_TEXT,
      PAYMENT_PROMPT_TEXT,
      'Total Amount: $19.98',
      'Paid $19.98 by cash.',
      MAIN_MENU_TEXT,
    ]);
    expect(session.orderBuilder.calculateTotal()).toBe(19.98);
  });

  test('should pay by credit card for method 2', () => {
    send('2', '2', '3');
    emit.mockClear();
    send('2');

    expect(output()).toEqual(['Total Amount: $8.99', 'Paid $8.99 by credit card.', MAIN_MENU_TEXT]);
  });

  test('should fall back to cash with a warning for an unknown payment method', () => {
    send('2', '2', '3');
    emit.mockClear();
    send('7');

    expect(output()).toEqual([
      DEFAULT_PAYMENT_TEXT,
      'Total Amount: $8.99',
      'Paid $8.99 by cash.',
      MAIN_MENU_TEXT,
    ]);
  });

  test('should ask for items first when paying an empty order', () => {
    send('3');

    expect(output()).toEqual([EMPTY_ORDER_TEXT, MAIN_MENU_TEXT]);
    expect(session.state).toBe(SessionState.MAIN_MENU);
  });

  test('should reject non-numeric main menu input and show the menu again', () => {
    send('pizza');

    expect(output()).toEqual([INVALID_INPUT_TEXT, MAIN_MENU_TEXT]);
    expect(session.state).toBe(SessionState.MAIN_MENU);
  });

  test('should reject an unknown main menu choice', () => {
    send('9');

    expect(output()).toEqual([INVALID_CHOICE_TEXT, MAIN_MENU_TEXT]);
  });

  test('should leave the order untouched for an invalid item number', () => {
    send('2', '3');

    expect(output()).toEqual([ITEM_PROMPT_TEXT, INVALID_ITEM_TEXT, MAIN_MENU_TEXT]);
    expect(session.orderBuilder.isEmpty()).toBe(true);
  });

  test('should return to the main menu on non-numeric item input', () => {
    send('2', 'two');

    expect(output()).toEqual([ITEM_PROMPT_TEXT, INVALID_INPUT_TEXT, MAIN_MENU_TEXT]);
    expect(session.state).toBe(SessionState.MAIN_MENU);
    expect(session.orderBuilder.isEmpty()).toBe(true);
  });

  test('should not pay on non-numeric payment input', () => {
    send('2', '1', '3');
    emit.mockClear();
    send('cash');

    expect(output()).toEqual([INVALID_INPUT_TEXT, MAIN_MENU_TEXT]);
  });

  test('should accept surrounding whitespace around a choice', () => {
    send(' 2 ', ' 1');

    expect(output()).toEqual([ITEM_PROMPT_TEXT, 'Pizza added to order.', MAIN_MENU_TEXT]);
  });

  test('should say goodbye, call the exit hook and ignore further input', () => {
    send('4');

    expect(output()).toEqual([GOODBYE_TEXT]);
    expect(onExit).toHaveBeenCalledTimes(1);
    expect(session.state).toBe(SessionState.EXITED);

    send('1', '2');
    expect(output()).toEqual([GOODBYE_TEXT]);
  });

  test('should not notify the chef by default', () => {
    send('2', '1', '3', '1');

    expect(output()).not.toContain('Chef: New order received.');
  });

  test('should notify the chef after payment when kitchen notification is on', () => {
    createSession(true);
    send('2', '1', '3');
    emit.mockClear();
    send('1');

    expect(output()).toEqual([
      'Total Amount: $10.99',
      'Paid $10.99 by cash.',
      'Chef: New order received.',
      MAIN_MENU_TEXT,
    ]);
  });

  test('should recover from an error raised while handling input', () => {
    emit.mockImplementation((text: string) => {
      if (text === 'Pizza added to order.') {
        throw new Error('emit failed');
      }
    });
    send('2', '1');

    expect(output()).toEqual([ITEM_PROMPT_TEXT, 'Pizza added to order.', UNEXPECTED_ERROR_TEXT, MAIN_MENU_TEXT]);
    expect(session.state).toBe(SessionState.MAIN_MENU);
  });

  test('should count unknown main menu choices under a single label', async () => {
    send('9', '-7', '123456', '1', 'n');

    const snapshot = await metrics.snapshot();
    expect(snapshot).toContain('menu_selections_total{choice="other"} 3');
    expect(snapshot).toContain('menu_selections_total{choice="1"} 1');
    expect(snapshot).not.toContain('menu_selections_total{choice="9"}');
  });

  test('should treat an out-of-range number as invalid input', () => {
    send('2147483648');

    expect(output()).toEqual([INVALID_INPUT_TEXT, MAIN_MENU_TEXT]);
  });

  test('should count selections, items, payments and invalid input', async () => {
    send('abc', '2', '1', '3', '2');

    const snapshot = await metrics.snapshot();
    expect(snapshot).toContain('invalid_inputs_total{prompt="main_menu"} 1');
    expect(snapshot).toContain('menu_selections_total{choice="2"} 1');
    expect(snapshot).toContain('order_items_added_total{item="Pizza"} 1');
    expect(snapshot).toContain('payments_total{method="credit card"} 1');
  });
});
