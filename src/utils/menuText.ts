export const WELCOME_TEXT = 'Welcome to the Restaurant!';

export const MAIN_MENU_TEXT = `
Choose an option:
1. Display Menu
2. Add Item to Order
3. Make Payment
4. Exit`;

export const MENU_ITEMS_HEADER = 'Menu Items:';
export const CHEESE_PROMPT_TEXT = 'Do you want to add extra cheese to the pizza? (Y/N):';
export const ITEM_PROMPT_TEXT = 'Enter item number to add (1 for Pizza, 2 for Pasta):';
export const PAYMENT_PROMPT_TEXT = `Select payment method:
1. Cash Payment
2. Credit Card Payment`;

export const INVALID_INPUT_TEXT = 'Invalid input. Please enter a number.';
export const INVALID_CHOICE_TEXT = 'Invalid choice. Please enter a valid option.';
export const INVALID_ITEM_TEXT = 'Invalid item number.';
export const EMPTY_ORDER_TEXT = 'Please add items to the order first.';
export const DEFAULT_PAYMENT_TEXT = 'Invalid choice. Using default payment method (Cash).';
export const GOODBYE_TEXT = 'Exiting program. Goodbye!';
export const UNEXPECTED_ERROR_TEXT = 'An unexpected error occurred.';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Parses a whole line as a 32-bit integer. Surrounding whitespace and a
 * leading sign are accepted; anything else, or a value out of range,
 * yields undefined.
 */
export function parseChoice(input: string): number | undefined {
  const trimmed = input.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return undefined;
  }

  const value = parseInt(trimmed, 10);
  return value >= INT32_MIN && value <= INT32_MAX ? value : undefined;
}

export function isYes(input: string): boolean {
  return input.trim().toUpperCase() === 'Y';
}
