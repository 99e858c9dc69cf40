/**
 * Rule runner and reporter tests
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadModules } from '../src/module-loader.js';
import { loadConfig } from '../src/config/config-loader.js';
import { createRules } from '../src/rules/index.js';
import { RuleRunner } from '../src/runner.js';
import { CollectingReporter, generateAuditRecord, generateSummary, writeAuditRecord } from '../src/reporter.js';
import type { MethodRule, RunStats } from '../src/types.js';

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

async function loadFixtures() {
  const { modules, errors } = await loadModules(['modules/*.yaml', 'modules/*.json'], FIXTURES);
  expect(errors).toEqual([]);
  return modules;
}

describe('RuleRunner', () => {
  it('reports unguarded methods across all loaded modules', async () => {
    const modules = await loadFixtures();
    const sink = new CollectingReporter();

    const { findings, stats } = new RuleRunner(createRules(), {}, sink).run(modules);

    expect(findings.map(f => `${f.type}::${f.method}`)).toEqual([
      'Acme.IO.WriteStuff::Write',
      'Acme.Logging.LoggingWriter::Flush',
    ]);
    expect(sink.findings).toEqual(findings);
    expect(stats).toEqual({
      modulesAnalyzed: 2,
      typesAnalyzed: 3,
      methodsAnalyzed: 9,
      results: { 'does-not-apply': 6, success: 1, failure: 2, skipped: 0 },
      suppressed: 0,
    });
  });

  it('drops findings matched by ignore rules', async () => {
    const modules = await loadFixtures();
    const config = await loadConfig(path.join(FIXTURES, 'project'));

    const { findings, stats } = new RuleRunner(createRules(config.rules), config).run(modules);

    expect(findings.map(f => f.method)).toEqual(['Write']);
    expect(stats.suppressed).toBe(1);
    expect(stats.results.failure).toBe(2);
  });

  it('contains a rule that throws to the method it was checking', async () => {
    const modules = await loadFixtures();
    const exploding: MethodRule = {
      id: 'exploding',
      problem: 'always fails',
      solution: 'none',
      checkMethod: () => {
        throw new Error('boom');
      },
    };

    const { findings, stats } = new RuleRunner([exploding, ...createRules()]).run(modules);

    expect(stats.results.skipped).toBe(9);
    expect(findings).toHaveLength(2);
  });

  it('exposes the ids of its rules', () => {
    expect(new RuleRunner(createRules()).ruleIds).toEqual(['use-object-disposed-exception']);
  });
});

describe('Reporter', () => {
  const stats: RunStats = {
    modulesAnalyzed: 1,
    typesAnalyzed: 1,
    methodsAnalyzed: 4,
    results: { 'does-not-apply': 2, success: 0, failure: 1, skipped: 1 },
    suppressed: 0,
  };

  it('stores findings as independent copies', () => {
    const reporter = new CollectingReporter();
    const finding = {
      rule: 'use-object-disposed-exception',
      type: 'Acme.IO.WriteStuff',
      method: 'Write',
      signature: 'System.Void Acme.IO.WriteStuff::Write()',
      severity: 'medium' as const,
      confidence: 'high' as const,
      message: 'Write uses instance state but never throws System.ObjectDisposedException',
    };

    reporter.report(finding);
    finding.method = 'Changed';

    expect(reporter.findings[0].method).toBe('Write');
    expect(Object.isFrozen(reporter.findings[0])).toBe(true);

    reporter.clear();
    expect(reporter.findings).toHaveLength(0);
  });

  it('summarizes findings by severity', async () => {
    const modules = await loadFixtures();
    const { findings } = new RuleRunner(createRules()).run(modules);

    expect(generateSummary(findings, stats)).toEqual({
      total_findings: 2,
      by_severity: { critical: 0, high: 0, medium: 2, low: 0, audit: 0 },
      skipped_methods: 1,
      suppressed_findings: 0,
      passed: false,
    });
    expect(generateSummary([], stats).passed).toBe(true);
  });

  it('writes the audit record as JSON', async () => {
    const modules = await loadFixtures();
    const runner = new RuleRunner(createRules());
    const { findings, stats: runStats } = runner.run(modules);

    const record = generateAuditRecord(findings, {
      modules: modules.modules.map(m => m.name),
      rules: runner.ruleIds,
      stats: runStats,
    });

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dispose-guard-'));
    const outputPath = path.join(dir, 'runs', 'audit.json');
    try {
      writeAuditRecord(record, outputPath);
      const written: unknown = JSON.parse(fs.readFileSync(outputPath, 'utf-8'));

      expect(written).toEqual(record);
      expect(record.tool).toBe('dispose-guard');
      expect(record.modules_analyzed).toEqual(['Acme.IO', 'Acme.Logging']);
      expect(record.methods_analyzed).toBe(9);
      expect(record.rules_applied).toEqual(['use-object-disposed-exception']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
