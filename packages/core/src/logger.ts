import type { PrepLogger } from './types';

/**
 * Logger used when the caller does not inject one
 */
export const noopLogger: PrepLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
