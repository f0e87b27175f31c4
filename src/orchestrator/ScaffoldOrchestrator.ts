import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ScaffoldConfig } from '../config/schema';
import { JacocoReportParser } from '../analyzer/JacocoReportParser';
import { ReportLocator } from '../analyzer/ReportLocator';
import { JavaTestGenerator } from '../generator/JavaTestGenerator';
import { TestSuiteWriter } from '../generator/TestSuiteWriter';
import { CoverageReport } from '../models/CoverageModels';
import { WrittenSuite } from '../models/GeneratedTest';
import { ScaffoldRun } from '../models/ScaffoldRun';
import { buildCoverageStats } from '../reporter/CoverageStats';
import logger from '../utils/logger';

/**
 * Run state
 */
export type RunState =
    | 'INIT'
    | 'LOCATE'
    | 'PARSE'
    | 'GENERATE'
    | 'WRITE'
    | 'COMPLETE'
    | 'FAILED';

export interface ExecuteOptions {
    /** Write the assembled suites below the configured output directory */
    write?: boolean;
    /** Overrides `generation.max_tests_per_gap` */
    maxTestsPerGap?: number;
}

/**
 * Drives a locate, parse, generate and write run
 */
export class ScaffoldOrchestrator {
    private config: ScaffoldConfig;
    private locator: ReportLocator;
    private parser: JacocoReportParser;
    private generator: JavaTestGenerator;
    private suiteWriter: TestSuiteWriter;
    private state: RunState = 'INIT';

    constructor(config: ScaffoldConfig) {
        this.config = config;
        this.locator = new ReportLocator();
        this.parser = new JacocoReportParser();
        this.generator = new JavaTestGenerator();
        this.suiteWriter = new TestSuiteWriter(this.generator);
    }

    getState(): RunState {
        return this.state;
    }

    /**
     * Locate and parse a report
     */
    async analyze(reportInput: string): Promise<{ reportPath: string; report: CoverageReport }> {
        try {
            this.setState('LOCATE');
            const reportPath = await this.locator.locate(reportInput);

            this.setState('PARSE');
            const report = await this.parser.parse(reportPath);

            return { reportPath, report };
        } catch (error) {
            this.setState('FAILED');
            throw error;
        }
    }

    /**
     * Execute the complete run
     */
    async execute(reportInput: string, options: ExecuteOptions = {}): Promise<ScaffoldRun> {
        const startTime = new Date().toISOString();
        const startTimestamp = Date.now();
        const maxTestsPerGap = options.maxTestsPerGap ?? this.config.generation.max_tests_per_gap;

        const { reportPath, report } = await this.analyze(reportInput);

        this.setState('GENERATE');
        const tests = this.generator.generateTests(report.gaps, maxTestsPerGap);

        let suites: WrittenSuite[] = [];
        if (options.write) {
            this.setState('WRITE');
            const outputDir = path.resolve(this.config.generation.output_dir);
            try {
                suites = await this.suiteWriter.writeSuites(outputDir, tests, report.gaps);
            } catch (error) {
                this.setState('FAILED');
                logger.error(`Failed to write test suites to ${outputDir}: ${error}`);
                throw error;
            }
        }

        this.setState('COMPLETE');

        return {
            runId: uuidv4(),
            reportPath,
            startTime,
            endTime: new Date().toISOString(),
            duration: Date.now() - startTimestamp,
            maxTestsPerGap,
            report,
            tests,
            suites,
            stats: buildCoverageStats(report, tests),
        };
    }

    private setState(state: RunState): void {
        this.state = state;
        logger.debug(`Run state: ${state}`);
    }
}
