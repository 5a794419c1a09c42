/**
 * Dev-only invariants and warnings
 */

import { logger } from './logger';

export function warnUnless(condition: boolean, message: string): void {
  if (!condition) {
    logger.warn(message);
  }
}
