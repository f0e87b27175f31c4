#!/usr/bin/env node

import * as dotenv from 'dotenv';
import path from 'path';
import { Command } from 'commander';
import { ConfigLoader } from '../config/ConfigLoader';
import { ScaffoldConfig } from '../config/schema';
import { ScaffoldOrchestrator } from '../orchestrator/ScaffoldOrchestrator';
import { ReportGenerator } from '../reporter/ReportGenerator';
import { RepoManager } from '../repo/RepoManager';
import { CoverageStats } from '../models/CoverageStats';
import { projectFailure, projectGenerateResult, projectParseResult, projectSummary } from './projections';
import logger from '../utils/logger';

dotenv.config();

export interface CliOptions {
    config?: string;
    top?: string;
    maxTests?: string;
    output?: string;
    write?: boolean;
    verbose?: boolean;
}

export interface GitCliOptions extends CliOptions {
    repo?: string;
    report?: string;
    remote?: string;
    branch?: string;
    base?: string;
    body?: string;
}

const program = new Command();

program
    .name('gapscaffold')
    .description('Find coverage gaps in JaCoCo reports and scaffold JUnit tests for them')
    .version('1.0.0');

program
    .command('parse')
    .description('Parse a JaCoCo XML report and list its coverage gaps')
    .argument('[report]', 'Report file or project directory')
    .option('-c, --config <path>', 'Custom config file')
    .action(parseAction);

program
    .command('summary')
    .description('Summarize coverage and the least covered methods')
    .argument('[report]', 'Report file or project directory')
    .option('-c, --config <path>', 'Custom config file')
    .option('-t, --top <number>', 'Number of gaps to list')
    .action(summaryAction);

program
    .command('generate')
    .description('Generate JUnit scaffolds for the least covered methods')
    .argument('[report]', 'Report file or project directory')
    .option('-c, --config <path>', 'Custom config file')
    .option('-m, --max-tests <number>', 'Test cases per coverage gap')
    .option('-w, --write', 'Write test classes and run reports')
    .option('-o, --output <dir>', 'Test source root for written classes')
    .option('-v, --verbose', 'Verbose output')
    .action(generateAction);

program
    .command('status')
    .description('Show the working tree status of a repository')
    .argument('[repo]', 'Repository path', '.')
    .action(statusAction);

program
    .command('stage')
    .description('Stage changes, skipping build artifacts')
    .argument('[repo]', 'Repository path', '.')
    .option('-c, --config <path>', 'Custom config file')
    .action(stageAction);

program
    .command('commit')
    .description('Commit staged changes, optionally with coverage statistics')
    .argument('<message>', 'Commit message')
    .option('-c, --config <path>', 'Custom config file')
    .option('--repo <path>', 'Repository path', '.')
    .option('--report <path>', 'Report whose statistics are appended')
    .option('-m, --max-tests <number>', 'Test cases per coverage gap for the statistics')
    .action(commitAction);

program
    .command('push')
    .description('Push a branch and set its upstream')
    .argument('[repo]', 'Repository path', '.')
    .option('-c, --config <path>', 'Custom config file')
    .option('--remote <name>', 'Remote name')
    .option('--branch <name>', 'Branch to push (default: current branch)')
    .action(pushAction);

program
    .command('pr')
    .description('Open a pull request with the GitHub CLI')
    .argument('<title>', 'Pull request title')
    .option('-c, --config <path>', 'Custom config file')
    .option('--repo <path>', 'Repository path', '.')
    .option('--base <branch>', 'Base branch')
    .option('--body <text>', 'Pull request description', '')
    .option('--report <path>', 'Report whose statistics are appended')
    .option('-m, --max-tests <number>', 'Test cases per coverage gap for the statistics')
    .action(prAction);

function parseInteger(value: string, optionName: string): number {
    if (!/^-?\d+$/.test(value.trim())) {
        throw new Error(`${optionName} must be an integer, got '${value}'`);
    }
    return parseInt(value, 10);
}

/**
 * Apply CLI options to config
 */
function applyCliOptions(config: ScaffoldConfig, options: CliOptions): ScaffoldConfig {
    if (options.top !== undefined) {
        config.summary.top_n = parseInteger(options.top, '--top');
    }
    if (options.maxTests !== undefined) {
        config.generation.max_tests_per_gap = parseInteger(options.maxTests, '--max-tests');
    }
    if (options.output) {
        config.generation.output_dir = options.output;
    }
    if (options.verbose) {
        config.output.verbose = true;
    }

    return config;
}

async function loadConfig(options: CliOptions): Promise<ScaffoldConfig> {
    const configLoader = new ConfigLoader();
    const config = applyCliOptions(await configLoader.load(options.config), options);
    if (config.output.verbose) {
        logger.level = 'debug';
    }
    return config;
}

function reportInput(report: string | undefined, config: ScaffoldConfig): string {
    return report ?? config.report.path ?? process.cwd();
}

function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

function fail(error: unknown, asJson: boolean): never {
    logger.error(`gapscaffold failed: ${error}`);
    if (asJson) {
        printJson(projectFailure(error));
    }
    console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
}

/**
 * Statistics for commit and PR annotations, from a fresh parse/generate pass
 */
async function statsFor(reportPath: string | undefined, config: ScaffoldConfig): Promise<CoverageStats | undefined> {
    if (!reportPath) {
        return undefined;
    }
    const run = await new ScaffoldOrchestrator(config).execute(reportPath);
    return run.stats;
}

async function parseAction(report: string | undefined, options: CliOptions): Promise<void> {
    try {
        const config = await loadConfig(options);
        const { report: coverage } = await new ScaffoldOrchestrator(config).analyze(reportInput(report, config));
        printJson(projectParseResult(coverage));
    } catch (error) {
        fail(error, true);
    }
}

async function summaryAction(report: string | undefined, options: CliOptions): Promise<void> {
    try {
        const config = await loadConfig(options);
        const { report: coverage } = await new ScaffoldOrchestrator(config).analyze(reportInput(report, config));
        printJson(projectSummary(coverage, config.summary.top_n));
    } catch (error) {
        fail(error, true);
    }
}

async function generateAction(report: string | undefined, options: CliOptions): Promise<void> {
    try {
        const config = await loadConfig(options);
        const orchestrator = new ScaffoldOrchestrator(config);
        const run = await orchestrator.execute(reportInput(report, config), { write: options.write === true });

        const response = projectGenerateResult(run.tests);
        if (!options.write) {
            printJson(response);
            return;
        }

        const outputDir = path.resolve(config.output.artifacts_dir, run.runId);
        const reports = await new ReportGenerator().generateReports(run, outputDir, config.output.format);
        printJson({
            ...response,
            writtenFiles: run.suites.map(suite => suite.filePath),
            reports,
        });
    } catch (error) {
        fail(error, true);
    }
}

async function statusAction(repo: string): Promise<void> {
    try {
        const status = await new RepoManager().getStatus(repo);
        printJson({ success: true, ...status });
    } catch (error) {
        fail(error, true);
    }
}

async function stageAction(repo: string, options: CliOptions): Promise<void> {
    try {
        const config = await loadConfig(options);
        const result = await new RepoManager().stageAll(repo, config.git.exclude_patterns);
        printJson(result);
        if (!result.success) {
            process.exit(1);
        }
    } catch (error) {
        fail(error, true);
    }
}

async function commitAction(message: string, options: GitCliOptions): Promise<void> {
    try {
        const config = await loadConfig(options);
        const stats = await statsFor(options.report, config);
        const result = await new RepoManager().commit(options.repo ?? '.', message, stats);
        printJson(result);
        if (!result.success) {
            process.exit(1);
        }
    } catch (error) {
        fail(error, true);
    }
}

async function pushAction(repo: string, options: GitCliOptions): Promise<void> {
    try {
        const config = await loadConfig(options);
        const result = await new RepoManager().push(repo, options.remote ?? config.git.remote, options.branch);
        printJson(result);
        if (!result.success) {
            process.exit(1);
        }
    } catch (error) {
        fail(error, true);
    }
}

async function prAction(title: string, options: GitCliOptions): Promise<void> {
    try {
        const config = await loadConfig(options);
        const stats = await statsFor(options.report, config);
        const result = await new RepoManager().createPullRequest(options.repo ?? '.', {
            title,
            base: options.base ?? config.git.base_branch,
            body: options.body,
            stats,
        });
        printJson(result);
        if (!result.success) {
            process.exit(1);
        }
    } catch (error) {
        fail(error, true);
    }
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parseAsync().catch((error: unknown) => fail(error, false));
}

export {
    program,
    applyCliOptions,
    parseAction,
    summaryAction,
    generateAction,
    statusAction,
    stageAction,
    commitAction,
    pushAction,
    prAction,
};
