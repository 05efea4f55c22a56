import { TransformerError } from '@fieldbridge/core';

/** Which side of the mapping a record is in, or is being moved into */
export const Direction = {
  Application: 'app',
  External: 'ext',
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

const DIRECTIONS: readonly string[] = Object.values(Direction);

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && DIRECTIONS.includes(value);
}

/**
 * Guard for callers outside the type system (plain JS, deserialized input)
 */
export function assertDirection(value: unknown): asserts value is Direction {
  if (!isDirection(value)) {
    throw new TransformerError({
      code: 'INVALID_DIRECTION',
      message: `Unknown direction: ${String(value)}`,
      suggestion: `Use one of: ${DIRECTIONS.join(', ')}`,
      context: { direction: value },
    });
  }
}

export function opposite(direction: Direction): Direction {
  return direction === Direction.Application ? Direction.External : Direction.Application;
}
