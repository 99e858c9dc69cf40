/**
 * Configuration Types
 *
 * Structure of the .disposeguardrc.json project file.
 */

import type { RuleOptions } from '../rules/index.js';

/**
 * Configuration file structure (.disposeguardrc.json)
 */
export interface DisposeGuardConfig {
  /** Per-rule options, keyed by rule id */
  rules?: RuleOptions;

  /** Findings to ignore */
  ignore?: IgnoreRule[];
}

/**
 * A single ignore rule from config file
 */
export interface IgnoreRule {
  /**
   * Glob over the declaring type's full name. `*` stays within one
   * namespace segment, `**` spans segments.
   */
  type?: string;

  /** Method name, or "*" */
  method?: string;

  /** Rule id, or "*" */
  rule?: string;

  /** Why the finding is ignored (required, at least 10 characters) */
  reason: string;
}
