#!/usr/bin/env node
import * as readline from 'readline';
import type { Logger } from 'winston';
import { config } from './config';
import { OrderingSession } from './services/orderingSession';
import { Emit, SessionState } from './types/session';
import { createLogger } from './utils/logger';
import { SessionMetrics } from './utils/metrics';

export interface StartSessionOptions {
  input: NodeJS.ReadableStream;
  emit: Emit;
  logger: Logger;
  metrics?: SessionMetrics;
  notifyKitchenOnPayment?: boolean;
}

// Resolves once the input closes, either after "Exit" or at end of input
export function startSession(options: StartSessionOptions): Promise<void> {
  const { logger } = options;
  const metrics = options.metrics ?? new SessionMetrics();
  const rl = readline.createInterface({ input: options.input, terminal: false });

  const session = new OrderingSession({
    emit: options.emit,
    logger,
    metrics,
    notifyKitchenOnPayment: options.notifyKitchenOnPayment,
    onExit: () => rl.close(),
  });

  return new Promise<void>((resolve) => {
    rl.on('line', (line) => session.handleInput(line));
    rl.on('close', () => {
      if (session.state !== SessionState.EXITED) {
        logger.info('Input closed before exit', { sessionId: session.sessionId, state: session.state });
      }
      metrics
        .snapshot()
        .then((snapshot) => logger.debug('Session metrics', { sessionId: session.sessionId, metrics: snapshot }))
        .catch((err) => logger.error('Failed to collect metrics', { error: err }))
        .finally(() => resolve());
    });

    session.start();
  });
}

if (require.main === module) {
  const logger = createLogger(config.log);

  logger.info('Starting ordering session', {
    env: {
      LOG_LEVEL: config.log.level,
      LOG_FILE: config.log.file,
      NOTIFY_KITCHEN_ON_PAYMENT: config.kitchen.notifyOnPayment,
    },
  });

  startSession({
    input: process.stdin,
    emit: (text) => console.log(text),
    logger,
    notifyKitchenOnPayment: config.kitchen.notifyOnPayment,
  })
    .then(() => {
      logger.end();
    })
    .catch((err) => {
      logger.error('Ordering session failed', { error: err });
      process.exit(1);
    });
}
