#!/usr/bin/env node

/**
 * CLI Entry Point - disposal-guard analysis over decoded module dumps
 */

import { Command } from 'commander';
import * as path from 'path';
import chalk from 'chalk';
import { loadModules } from './module-loader.js';
import { loadConfig, createDefaultConfig, CONFIG_FILENAME } from './config/config-loader.js';
import { createRules } from './rules/index.js';
import { RuleRunner } from './runner.js';
import {
  TOOL_VERSION,
  generateAuditRecord,
  printLoadErrors,
  printTerminalReport,
  writeAuditRecord,
} from './reporter.js';
import { setVerbose } from './log.js';

interface CheckOptions {
  project: string;
  output?: string;
  terminal: boolean;
  failOnFindings: boolean;
  verbose: boolean;
}

const program = new Command();

program
  .name('dispose-guard')
  .description('Check that public methods of disposable types guard against use after disposal')
  .version(TOOL_VERSION);

program
  .command('check')
  .description('Analyze one or more decoded module dumps (YAML or JSON, globs allowed)')
  .argument('<dumps...>', 'Module dump files or glob patterns')
  .option('--project <path>', `Project root containing ${CONFIG_FILENAME}`, process.cwd())
  .option('--output <path>', 'Write the audit record JSON to this path')
  .option('--no-terminal', 'Disable terminal output')
  .option('--fail-on-findings', 'Exit with error code if findings are reported', false)
  .option('--verbose', 'Log every signal the rules find', false)
  .action(async (dumps: string[], options: CheckOptions) => {
    await check(dumps, options);
  });

program
  .command('rules')
  .description('List the available rules')
  .action(() => {
    for (const rule of createRules()) {
      console.log(`\n${chalk.bold.cyan(rule.id)}`);
      console.log(`  ${chalk.dim('Problem:')}  ${rule.problem}`);
      console.log(`  ${chalk.dim('Solution:')} ${rule.solution}`);
    }
    console.log('');
  });

program
  .command('init')
  .description(`Create a default ${CONFIG_FILENAME}`)
  .option('--project <path>', 'Project root directory', process.cwd())
  .action(async (options: { project: string }) => {
    try {
      const configPath = await createDefaultConfig(path.resolve(options.project));
      console.log(chalk.green(`Created ${configPath}`));
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});

async function check(dumps: string[], options: CheckOptions): Promise<void> {
  setVerbose(options.verbose);

  const projectRoot = path.resolve(options.project);
  const config = await loadConfig(projectRoot);

  const { modules, errors } = await loadModules(dumps);
  if (errors.length > 0) {
    printLoadErrors(errors);
    process.exit(1);
  }

  const runner = new RuleRunner(createRules(config.rules), config);
  const { findings, stats } = runner.run(modules);

  const record = generateAuditRecord(findings, {
    modules: modules.modules.map(m => m.name),
    rules: runner.ruleIds,
    stats,
  });

  if (options.output) {
    const outputPath = path.resolve(options.output);
    writeAuditRecord(record, outputPath);
    if (options.terminal) {
      console.log(chalk.dim(`Audit record written to ${outputPath}`));
    }
  }

  if (options.terminal) {
    printTerminalReport(record);
  }

  if (options.failOnFindings && !record.summary.passed) {
    process.exit(1);
  }
}
