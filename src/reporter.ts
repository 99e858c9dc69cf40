/**
 * Reporter - collects findings, generates audit records and terminal output
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { AuditRecord, AuditSummary, Finding, Reporter, RunStats, Severity } from './types.js';

export const TOOL_NAME = 'dispose-guard';
export const TOOL_VERSION = '0.1.0'; // Should match package.json

const SEVERITIES: Severity[] = ['critical', 'high', 'medium', 'low', 'audit'];

/**
 * Reporter that keeps every finding in memory, in arrival order
 */
export class CollectingReporter implements Reporter {
  private readonly collected: Finding[] = [];

  report(finding: Finding): void {
    // Stored as a frozen copy so a caller cannot change it after the fact
    this.collected.push(Object.freeze({ ...finding }));
  }

  get findings(): readonly Finding[] {
    return this.collected;
  }

  clear(): void {
    this.collected.length = 0;
  }
}

/**
 * Generates an audit record from a finished run
 */
export function generateAuditRecord(
  findings: readonly Finding[],
  config: {
    modules: string[];
    rules: string[];
    stats: RunStats;
  }
): AuditRecord {
  return {
    tool: TOOL_NAME,
    tool_version: TOOL_VERSION,
    timestamp: new Date().toISOString(),
    modules_analyzed: config.modules,
    methods_analyzed: config.stats.methodsAnalyzed,
    rules_applied: config.rules,
    findings: [...findings],
    summary: generateSummary(findings, config.stats),
  };
}

/**
 * Generates summary statistics
 */
export function generateSummary(findings: readonly Finding[], stats: RunStats): AuditSummary {
  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, audit: 0 };
  for (const finding of findings) {
    bySeverity[finding.severity]++;
  }

  return {
    total_findings: findings.length,
    by_severity: bySeverity,
    skipped_methods: stats.results.skipped,
    suppressed_findings: stats.suppressed,
    passed: findings.length === 0,
  };
}

/**
 * Writes audit record to JSON file
 */
export function writeAuditRecord(record: AuditRecord, outputPath: string): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(record, null, 2), 'utf-8');
}

/**
 * Prints findings to terminal in human-readable format
 */
export function printTerminalReport(record: AuditRecord): void {
  console.log('\n' + chalk.bold('Dispose Guard Report'));
  console.log(chalk.gray('─'.repeat(80)));

  console.log(`\n${chalk.bold('Summary:')}`);
  console.log(`  Modules: ${record.modules_analyzed.join(', ')}`);
  console.log(`  Methods analyzed: ${record.methods_analyzed}`);
  console.log(`  Rules: ${record.rules_applied.join(', ')}`);
  console.log(`  Timestamp: ${record.timestamp}`);

  if (record.findings.length === 0) {
    console.log(`\n${chalk.green('✓')} ${chalk.bold('No findings!')}`);
    printFooter(record);
    return;
  }

  console.log(`\n${chalk.bold('Findings:')}`);

  for (const severity of SEVERITIES) {
    const group = record.findings.filter(f => f.severity === severity);
    if (group.length === 0) continue;

    const color = getSeverityColor(severity);
    console.log(`\n${chalk.bold(color(`${capitalize(severity)} (${group.length}):`))}`);
    group.forEach(printFinding);
  }

  printFooter(record);
}

function printFooter(record: AuditRecord): void {
  const { summary } = record;

  console.log(chalk.gray('\n' + '─'.repeat(80)));
  console.log(`  Total findings: ${summary.total_findings}`);
  if (summary.suppressed_findings > 0) {
    console.log(`  ${chalk.dim('Suppressed')}: ${summary.suppressed_findings}`);
  }
  if (summary.skipped_methods > 0) {
    console.log(`  ${chalk.yellow('Skipped (malformed body)')}: ${summary.skipped_methods}`);
  }

  const statusIcon = summary.passed ? chalk.green('✓') : chalk.red('✗');
  const statusText = summary.passed ? chalk.green('PASSED') : chalk.red('FAILED');
  console.log(`\n${statusIcon} ${statusText}\n`);
}

/**
 * Prints a single finding
 */
function printFinding(finding: Finding): void {
  const color = getSeverityColor(finding.severity);

  console.log(`\n  ${color('✗')} ${color(`${finding.type}::${finding.method}`)}`);
  console.log(`    ${chalk.bold(finding.message)}`);
  console.log(`    ${chalk.dim('Method:')} ${finding.signature}`);
  console.log(`    ${chalk.dim('Rule:')} ${finding.rule} ${chalk.dim(`(confidence: ${finding.confidence})`)}`);
}

/**
 * Gets the color function for a severity level
 */
function getSeverityColor(severity: Severity): (text: string) => string {
  switch (severity) {
    case 'critical':
    case 'high':
      return chalk.red;
    case 'medium':
      return chalk.yellow;
    case 'low':
      return chalk.blue;
    case 'audit':
      return chalk.white;
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Prints module loading errors
 */
export function printLoadErrors(errors: string[]): void {
  console.error(chalk.red.bold('\nModule Loading Errors:'));
  errors.forEach(err => {
    console.error(chalk.red(`  ✗ ${err}`));
  });
  console.error('');
}
