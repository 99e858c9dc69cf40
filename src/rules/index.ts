/**
 * Rule registry
 */

import { DisposeGuardRule } from './dispose-guard-rule.js';
import type { DisposeGuardOptions } from './dispose-guard-rule.js';
import type { MethodRule } from '../types.js';

export { DisposeGuardRule, DEFAULT_DISPOSE_GUARD_OPTIONS } from './dispose-guard-rule.js';
export type { DisposeGuardOptions } from './dispose-guard-rule.js';

export interface RuleOptions {
  'use-object-disposed-exception'?: Partial<DisposeGuardOptions>;
}

/**
 * Instantiates every registered rule with its configured options
 */
export function createRules(options: RuleOptions = {}): MethodRule[] {
  return [new DisposeGuardRule(options['use-object-disposed-exception'])];
}
