/**
 * Progress observers
 */

import type { ProgressObserver } from "../../types";
import { logger } from "../../utils/logger";

/**
 * Forwards progress messages to the logger
 */
export class ConsoleProgressObserver implements ProgressObserver {
  update(message: string): void {
    logger.info(message);
  }
}

/**
 * Deliver a message to every observer. A throwing observer is logged and
 * skipped; it never affects the run.
 */
export function notifyObservers(observers: readonly ProgressObserver[], message: string): void {
  for (const observer of observers) {
    try {
      observer.update(message);
    } catch (error) {
      logger.warn(`Progress observer failed: ${(error as Error).message}`);
    }
  }
}
