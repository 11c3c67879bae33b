/**
 * Option parsers for commander.
 */

import { InvalidArgumentError } from 'commander';
import { SELECTION_STRATEGIES } from '../matching/types.js';
import type { SelectionStrategy } from '../matching/types.js';
import { SessionIdSchema } from '../session/session.js';

/** A number between 0 and 1, e.g. a threshold. */
export function parseFraction(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return n;
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseStrategy(value: string): SelectionStrategy {
  const strategy = SELECTION_STRATEGIES.find((s) => s === value);
  if (!strategy) {
    throw new InvalidArgumentError(`Expected one of: ${SELECTION_STRATEGIES.join(', ')}.`);
  }
  return strategy;
}

export function parseSessionIdArgument(value: string): string {
  const result = SessionIdSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`${result.error.issues[0].message}.`);
  }
  return result.data;
}
