import dotenv from 'dotenv';

dotenv.config();

export const config = {
  log: {
    level: process.env.LOG_LEVEL || 'info',
    file: process.env.LOG_FILE || 'logs/app.log',
    // stdout carries the dialogue, so console logging goes to stderr and is opt-in
    console: process.env.LOG_CONSOLE === 'true',
  },
  kitchen: {
    notifyOnPayment: process.env.NOTIFY_KITCHEN_ON_PAYMENT === 'true',
  },
} as const;
