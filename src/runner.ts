/**
 * Rule Runner - feeds every method of the loaded modules to the rules
 */

import { findMatchingRules } from './config/config-loader.js';
import type { DisposeGuardConfig } from './config/types.js';
import { createLogger } from './log.js';
import { formatMethod } from './method-signature.js';
import type { LoadedModules } from './module-loader.js';
import type { AnalysisContext, Finding, Method, MethodRule, Reporter, RuleResult, RunStats } from './types.js';

const log = createLogger('runner');

export interface RunResult {
  findings: Finding[];
  stats: RunStats;
}

export class RuleRunner {
  private readonly rules: readonly MethodRule[];
  private readonly config: DisposeGuardConfig;
  private readonly sink?: Reporter;

  constructor(rules: readonly MethodRule[], config: DisposeGuardConfig = {}, sink?: Reporter) {
    this.rules = rules;
    this.config = config;
    this.sink = sink;
  }

  get ruleIds(): string[] {
    return this.rules.map(rule => rule.id);
  }

  run(loaded: LoadedModules): RunResult {
    const findings: Finding[] = [];
    const stats: RunStats = {
      modulesAnalyzed: loaded.modules.length,
      typesAnalyzed: 0,
      methodsAnalyzed: 0,
      results: { 'does-not-apply': 0, success: 0, failure: 0, skipped: 0 },
      suppressed: 0,
    };

    // Drops ignored findings before they reach the caller's sink
    const reporter: Reporter = {
      report: (finding: Finding): void => {
        const ignored = findMatchingRules(this.config, finding);
        if (ignored.length > 0) {
          log.debug(`ignored ${finding.signature}: ${ignored[0].reason}`);
          stats.suppressed++;
          return;
        }
        findings.push(finding);
        this.sink?.report(finding);
      },
    };

    const context: AnalysisContext = {
      hierarchy: loaded,
      resolver: loaded,
      generatedCode: loaded,
      reporter,
    };

    for (const module of loaded.modules) {
      log.debug(`module ${module.name} (${module.source})`);

      for (const type of module.types) {
        stats.typesAnalyzed++;

        for (const method of type.methods) {
          stats.methodsAnalyzed++;
          for (const rule of this.rules) {
            stats.results[this.checkMethod(rule, method, context)]++;
          }
        }
      }
    }

    return { findings, stats };
  }

  /**
   * One rule on one method. A rule that throws only loses that method.
   */
  private checkMethod(rule: MethodRule, method: Method, context: AnalysisContext): RuleResult {
    try {
      return rule.checkMethod(method, context);
    } catch (err) {
      log.error(`${rule.id} failed on ${formatMethod(method)}: ${err instanceof Error ? err.message : String(err)}`);
      return 'skipped';
    }
  }
}
