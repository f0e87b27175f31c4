import { CoverageReport } from '../models/CoverageModels';
import { GeneratedTest } from '../models/GeneratedTest';
import { round2 } from '../reporter/CoverageStats';

/**
 * Display limits of the structured responses; the core never truncates
 */
export const PARSE_TOP_GAPS = 20;
export const PARSE_UNCOVERED_LINES = 5;
export const GENERATE_TESTS_SHOWN = 10;

export interface GapView {
    className: string;
    methodName: string | null;
    lineCoverage: number;
    branchCoverage: number;
    uncoveredLines: number[];
}

export interface ParseResponse {
    success: true;
    totalLineCoverage: number;
    totalBranchCoverage: number;
    totalGaps: number;
    topGaps: GapView[];
}

export interface TestView {
    testClass: string;
    testMethod: string;
    targetClass: string;
    targetMethod: string | null;
    testCode: string;
}

export interface GenerateResponse {
    success: true;
    testsGenerated: number;
    tests: TestView[];
}

export interface SummaryResponse {
    success: true;
    summary: {
        totalLineCoverage: number;
        totalBranchCoverage: number;
        coverageGap: number;
        totalMethodsWithGaps: number;
    };
    topUncoveredMethods: Array<{
        className: string;
        methodName: string | null;
        lineCoveragePercent: number;
        branchCoveragePercent: number;
    }>;
}

export interface FailureResponse {
    success: false;
    error: string;
}

export function projectParseResult(report: CoverageReport): ParseResponse {
    return {
        success: true,
        totalLineCoverage: round2(report.totalLineCoveragePct),
        totalBranchCoverage: round2(report.totalBranchCoveragePct),
        totalGaps: report.gaps.length,
        topGaps: report.gaps.slice(0, PARSE_TOP_GAPS).map(gap => ({
            className: gap.classFullName,
            methodName: gap.methodSignature ?? null,
            lineCoverage: round2(gap.lineCoveragePct),
            branchCoverage: round2(gap.branchCoveragePct),
            uncoveredLines: gap.uncoveredLines.slice(0, PARSE_UNCOVERED_LINES),
        })),
    };
}

export function projectGenerateResult(tests: readonly GeneratedTest[]): GenerateResponse {
    return {
        success: true,
        testsGenerated: tests.length,
        tests: tests.slice(0, GENERATE_TESTS_SHOWN).map(test => ({
            testClass: test.testClassName,
            testMethod: test.testMethodName,
            targetClass: test.targetClass,
            targetMethod: test.targetMethod ?? null,
            testCode: test.testBody,
        })),
    };
}

export function projectSummary(report: CoverageReport, topN: number): SummaryResponse {
    return {
        success: true,
        summary: {
            totalLineCoverage: round2(report.totalLineCoveragePct),
            totalBranchCoverage: round2(report.totalBranchCoveragePct),
            coverageGap: round2(100 - report.totalLineCoveragePct),
            totalMethodsWithGaps: report.gaps.length,
        },
        topUncoveredMethods: report.gaps.slice(0, Math.max(topN, 0)).map(gap => ({
            className: gap.classFullName,
            methodName: gap.methodSignature ?? null,
            lineCoveragePercent: round2(gap.lineCoveragePct),
            branchCoveragePercent: round2(gap.branchCoveragePct),
        })),
    };
}

export function projectFailure(error: unknown): FailureResponse {
    return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
    };
}
