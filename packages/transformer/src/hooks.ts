import type { DataRecord } from '@fieldbridge/core';
import { Direction } from './types/index.js';

/** Rewrites a whole record before or after field mapping */
export type RecordHook = (record: DataRecord) => DataRecord;

export interface DirectionHooks {
  /** Runs on the raw input record */
  before: RecordHook;
  /** Runs on the mapped output record */
  after: RecordHook;
}

/** Per-direction hook overrides; anything left out stays the identity */
export type HookConfig = {
  [D in Direction]?: Partial<DirectionHooks>;
};

const identity: RecordHook = (record) => record;

export const identityHooks: DirectionHooks = Object.freeze({
  before: identity,
  after: identity,
});

function withDefaults(hooks: Partial<DirectionHooks> = {}): DirectionHooks {
  return {
    before: hooks.before ?? identityHooks.before,
    after: hooks.after ?? identityHooks.after,
  };
}

export function resolveHooks(config: HookConfig = {}): Record<Direction, DirectionHooks> {
  return {
    [Direction.Application]: withDefaults(config[Direction.Application]),
    [Direction.External]: withDefaults(config[Direction.External]),
  };
}
