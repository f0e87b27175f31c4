import path from 'path';
import { ConfigLoader } from './config/ConfigLoader';
import { ScaffoldOrchestrator } from './orchestrator/ScaffoldOrchestrator';
import { ReportGenerator } from './reporter/ReportGenerator';
import logger from './utils/logger';

/**
 * Main entry point for programmatic usage
 */
export async function runScaffold(reportInput?: string, configPath?: string) {
    try {
        logger.info('Starting gapscaffold...');

        const configLoader = new ConfigLoader();
        const config = await configLoader.load(configPath);
        if (config.output.verbose) {
            logger.level = 'debug';
        }

        const orchestrator = new ScaffoldOrchestrator(config);
        const run = await orchestrator.execute(reportInput ?? config.report.path ?? process.cwd(), { write: true });

        const reportGenerator = new ReportGenerator();
        const outputDir = path.join(config.output.artifacts_dir, run.runId);
        const reports = await reportGenerator.generateReports(run, outputDir, config.output.format);

        logger.info('gapscaffold completed successfully');

        return {
            run,
            reports,
        };
    } catch (error) {
        logger.error(`gapscaffold failed: ${error}`);
        throw error;
    }
}

// Export main components for library usage
export { ConfigLoader } from './config/ConfigLoader';
export { JacocoReportParser, ReportUnreadableError } from './analyzer/JacocoReportParser';
export { ReportLocator } from './analyzer/ReportLocator';
export { JavaTestGenerator } from './generator/JavaTestGenerator';
export { TestSuiteWriter, groupBySuite } from './generator/TestSuiteWriter';
export { ScaffoldOrchestrator } from './orchestrator/ScaffoldOrchestrator';
export { ReportGenerator } from './reporter/ReportGenerator';
export { buildCoverageStats, formatCommitStats, formatPullRequestStats } from './reporter/CoverageStats';
export { RepoManager } from './repo/RepoManager';
export * from './models/CoverageModels';
export * from './models/GeneratedTest';
export * from './models/CoverageStats';
export * from './models/GitModels';
export * from './models/ScaffoldRun';
export * from './config/schema';
