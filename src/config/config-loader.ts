/**
 * Configuration File Loader
 *
 * Loads and validates .disposeguardrc.json
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DisposeGuardConfig, IgnoreRule } from './types.js';
import type { Finding } from '../types.js';
import type { DisposeGuardOptions } from '../rules/index.js';

export const CONFIG_FILENAME = '.disposeguardrc.json';

const RULE_OPTION_KEYS = ['lifecycleInterface', 'guardException', 'disposeMethod', 'helperNameFragments'];

/**
 * Load configuration from project root
 *
 * @param projectRoot - Absolute path to project root
 * @returns Configuration object, or empty config if file doesn't exist
 */
export async function loadConfig(projectRoot: string): Promise<DisposeGuardConfig> {
  const configPath = path.join(projectRoot, CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    return { ignore: [] };
  }

  try {
    const content = await fs.promises.readFile(configPath, 'utf-8');
    return parseConfig(JSON.parse(content));
  } catch (error) {
    throw new Error(
      `Failed to load ${CONFIG_FILENAME}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Validate parsed JSON and narrow it to a configuration
 *
 * @throws Error if configuration is invalid
 */
export function parseConfig(value: unknown): DisposeGuardConfig {
  if (!isRecord(value)) {
    throw new Error('Configuration must be an object');
  }

  const config: DisposeGuardConfig = { ignore: [] };

  if (value.rules !== undefined) {
    config.rules = parseRuleOptions(value.rules);
  }

  if (value.ignore !== undefined) {
    if (!Array.isArray(value.ignore)) {
      throw new Error('"ignore" must be an array');
    }
    config.ignore = value.ignore.map((rule: unknown, index: number) => parseIgnoreRule(rule, index));
  }

  return config;
}

function parseRuleOptions(value: unknown): NonNullable<DisposeGuardConfig['rules']> {
  if (!isRecord(value)) {
    throw new Error('"rules" must be an object');
  }

  const options = value['use-object-disposed-exception'];
  if (options === undefined) {
    return {};
  }
  if (!isRecord(options)) {
    throw new Error('rules["use-object-disposed-exception"] must be an object');
  }

  for (const key of Object.keys(options)) {
    if (!RULE_OPTION_KEYS.includes(key)) {
      throw new Error(`rules["use-object-disposed-exception"]: unknown option "${key}"`);
    }
  }

  const { lifecycleInterface, guardException, disposeMethod, helperNameFragments } = options;
  const parsed: Partial<DisposeGuardOptions> = {};

  if (lifecycleInterface !== undefined) {
    parsed.lifecycleInterface = requireName(lifecycleInterface, 'lifecycleInterface');
  }
  if (guardException !== undefined) {
    parsed.guardException = requireName(guardException, 'guardException');
  }
  if (disposeMethod !== undefined) {
    parsed.disposeMethod = requireName(disposeMethod, 'disposeMethod');
  }
  if (helperNameFragments !== undefined) {
    if (!Array.isArray(helperNameFragments) || helperNameFragments.length === 0) {
      throw new Error('"helperNameFragments" must be a non-empty array of strings');
    }
    parsed.helperNameFragments = helperNameFragments.map((fragment: unknown) =>
      requireName(fragment, 'helperNameFragments')
    );
  }

  return { 'use-object-disposed-exception': parsed };
}

function requireName(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`"${field}" must be a non-empty string`);
  }
  return value;
}

/**
 * Validate a single ignore rule
 *
 * @param value - Ignore rule to validate
 * @param index - Index in ignore array (for error messages)
 */
function parseIgnoreRule(value: unknown, index: number): IgnoreRule {
  if (!isRecord(value)) {
    throw new Error(`ignore[${index}]: Rule must be an object`);
  }

  const { type, method, rule, reason } = value;

  if (type !== undefined && typeof type !== 'string') {
    throw new Error(`ignore[${index}]: "type" must be a string`);
  }
  if (method !== undefined && typeof method !== 'string') {
    throw new Error(`ignore[${index}]: "method" must be a string`);
  }
  if (rule !== undefined && typeof rule !== 'string') {
    throw new Error(`ignore[${index}]: "rule" must be a string`);
  }

  // Require at least one matching criterion
  if (!type && !method && !rule) {
    throw new Error(`ignore[${index}]: Rule must specify at least one of: type, method, rule`);
  }

  if (typeof reason !== 'string' || !reason) {
    throw new Error(`ignore[${index}]: Rule must have a "reason" field`);
  }

  if (reason.trim().length < 10) {
    throw new Error(
      `ignore[${index}]: Reason must be at least 10 characters. Provide meaningful explanation.`
    );
  }

  return { type, method, rule, reason };
}

/**
 * Check if an ignore rule matches a finding
 */
export function ruleMatches(rule: IgnoreRule, finding: Finding): boolean {
  if (rule.type && !matchTypePattern(rule.type, finding.type)) {
    return false;
  }

  if (rule.method && rule.method !== '*' && rule.method !== finding.method) {
    return false;
  }

  if (rule.rule && rule.rule !== '*' && rule.rule !== finding.rule) {
    return false;
  }

  // All specified criteria match
  return true;
}

/**
 * Glob matching over dotted type names
 *
 * Supports:
 * - * (any characters except .)
 * - ** (any characters including .)
 * - ? (single character)
 */
export function matchTypePattern(pattern: string, typeName: string): boolean {
  const regexPattern = pattern
    .split('**')
    .map(part =>
      part
        .replace(/[.+^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '[^.]*')
        .replace(/\?/g, '.')
    )
    .join('.*');

  return new RegExp(`^${regexPattern}$`).test(typeName);
}

/**
 * Find all ignore rules matching a finding
 */
export function findMatchingRules(config: DisposeGuardConfig, finding: Finding): IgnoreRule[] {
  if (!config.ignore) {
    return [];
  }

  return config.ignore.filter(rule => ruleMatches(rule, finding));
}

/**
 * Create a default configuration file
 *
 * @param projectRoot - Project root directory
 */
export async function createDefaultConfig(projectRoot: string): Promise<string> {
  const configPath = path.join(projectRoot, CONFIG_FILENAME);

  if (fs.existsSync(configPath)) {
    throw new Error(`${CONFIG_FILENAME} already exists`);
  }

  const defaultConfig: DisposeGuardConfig = {
    rules: {
      'use-object-disposed-exception': {
        lifecycleInterface: 'System.IDisposable',
        guardException: 'System.ObjectDisposedException',
      },
    },
    ignore: [
      {
        type: '**.Tests.**',
        reason: 'Test fixtures intentionally use disposed objects',
      },
    ],
  };

  await fs.promises.writeFile(configPath, JSON.stringify(defaultConfig, null, 2), 'utf-8');
  return configPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
