/**
 * Option schemas validated at the public boundary
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { RecordError } from '../errors';
import { consoleLogger, Logger } from '../logger';
import type { StateOptions } from '../types/state.types';

const isLogger = (value: unknown): value is Logger =>
  typeof value === 'object' &&
  value !== null &&
  ['debug', 'info', 'warn', 'error'].every(
    (method) => typeof Reflect.get(value, method) === 'function'
  );

export const stateOptionsSchema = z.object({
  id: z.string().min(1).optional(),
  allowRepeats: z.boolean().default(true),
  clock: z
    .custom<() => Date>((value) => typeof value === 'function', {
      message: 'clock must be a function returning a Date',
    })
    .optional(),
  logger: z
    .custom<Logger>(isLogger, {
      message: 'logger must implement debug, info, warn and error',
    })
    .optional(),
});

export type ResolvedStateOptions = {
  id: string;
  allowRepeats: boolean;
  clock: () => Date;
  logger: Logger;
};

/**
 * Applies defaults to state options
 * @throws RecordError when an option has the wrong shape
 */
export function resolveStateOptions(
  options: StateOptions = {}
): ResolvedStateOptions {
  const parsed = stateOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new RecordError(
      'state options',
      parsed.error.issues.map((issue) => issue.message).join('; ')
    );
  }

  return {
    id: parsed.data.id ?? randomUUID(),
    allowRepeats: parsed.data.allowRepeats,
    clock: parsed.data.clock ?? (() => new Date()),
    logger: parsed.data.logger ?? consoleLogger,
  };
}
