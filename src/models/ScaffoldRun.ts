import { CoverageReport } from './CoverageModels';
import { CoverageStats } from './CoverageStats';
import { GeneratedTest, WrittenSuite } from './GeneratedTest';

/**
 * Everything a single parse/generate run produced
 */
export interface ScaffoldRun {
    runId: string;
    reportPath: string;
    startTime: string;
    endTime: string;
    duration: number;
    maxTestsPerGap: number;
    report: CoverageReport;
    tests: GeneratedTest[];
    suites: WrittenSuite[];
    stats: CoverageStats;
}
