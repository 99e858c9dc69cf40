/**
 * Opcode Bitmask - per-method summary of which opcode categories occur
 *
 * Rules use it to reject a method before walking its instructions.
 */

import type { Method, OpcodeTag } from './types.js';

const BITS: Record<OpcodeTag, number> = {
  'invoke-direct': 1 << 0,
  'invoke-virtual': 1 << 1,
  'load-field': 1 << 2,
  'store-field': 1 << 3,
  'load-field-address': 1 << 4,
  'construct-object': 1 << 5,
  'load-self': 1 << 6,
  'other': 1 << 7,
};

export class OpcodeBitmask {
  readonly mask: number;

  constructor(mask: number = 0) {
    this.mask = mask;
  }

  static of(...tags: OpcodeTag[]): OpcodeBitmask {
    return new OpcodeBitmask(tags.reduce((mask, tag) => mask | BITS[tag], 0));
  }

  get(tag: OpcodeTag): boolean {
    return (this.mask & BITS[tag]) !== 0;
  }

  with(tag: OpcodeTag): OpcodeBitmask {
    return new OpcodeBitmask(this.mask | BITS[tag]);
  }

  /** True if any category is present in both masks */
  intersects(other: OpcodeBitmask): boolean {
    return (this.mask & other.mask) !== 0;
  }

  toString(): string {
    return `0x${this.mask.toString(16).padStart(2, '0')}`;
  }
}

export const CALLS_AND_FIELDS = OpcodeBitmask.of(
  'invoke-direct',
  'invoke-virtual',
  'load-field',
  'store-field',
  'load-field-address'
);

// Methods are immutable during analysis, so the summary never goes stale
const cache = new WeakMap<Method, OpcodeBitmask>();

/**
 * Union of the opcode categories present anywhere in the method body
 */
export function summarize(method: Method): OpcodeBitmask {
  const cached = cache.get(method);
  if (cached) {
    return cached;
  }

  let mask = 0;
  for (const ins of method.instructions) {
    mask |= BITS[ins.opcode];
  }

  const bitmask = new OpcodeBitmask(mask);
  cache.set(method, bitmask);
  return bitmask;
}

export function intersects(mask: OpcodeBitmask, other: OpcodeBitmask): boolean {
  return mask.intersects(other);
}

export function isCall(tag: OpcodeTag): boolean {
  return tag === 'invoke-direct' || tag === 'invoke-virtual';
}

export function isFieldAccess(tag: OpcodeTag): boolean {
  return tag === 'load-field' || tag === 'store-field' || tag === 'load-field-address';
}
