import { CoverageReport } from '../models/CoverageModels';
import { CoverageStats } from '../models/CoverageStats';
import { GeneratedTest } from '../models/GeneratedTest';

export function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Statistics a commit or pull request can carry for a parse/generate run
 */
export function buildCoverageStats(report: CoverageReport, tests: readonly GeneratedTest[]): CoverageStats {
    return {
        lineCoveragePct: round2(report.totalLineCoveragePct),
        branchCoveragePct: round2(report.totalBranchCoveragePct),
        testsGenerated: tests.length,
        coverageGap: round2(100 - report.totalLineCoveragePct),
    };
}

/**
 * Trailer appended to commit messages
 */
export function formatCommitStats(stats: CoverageStats): string {
    const lines: string[] = [];
    if (stats.lineCoveragePct !== undefined) {
        lines.push(`- Line Coverage: ${stats.lineCoveragePct.toFixed(2)}%`);
    }
    if (stats.branchCoveragePct !== undefined) {
        lines.push(`- Branch Coverage: ${stats.branchCoveragePct.toFixed(2)}%`);
    }
    if (stats.testsGenerated !== undefined) {
        lines.push(`- Tests Generated: ${stats.testsGenerated}`);
    }
    if (stats.coverageGap !== undefined) {
        lines.push(`- Coverage Gap: ${stats.coverageGap.toFixed(2)}%`);
    }

    if (lines.length === 0) {
        return '';
    }
    return `\n\nCoverage Update:\n${lines.join('\n')}`;
}

/**
 * Markdown section appended to pull request bodies
 */
export function formatPullRequestStats(stats: CoverageStats): string {
    let section = '';
    if (stats.lineCoveragePct !== undefined) {
        section += `- Line Coverage: ${stats.lineCoveragePct.toFixed(2)}%\n`;
    }
    if (stats.branchCoveragePct !== undefined) {
        section += `- Branch Coverage: ${stats.branchCoveragePct.toFixed(2)}%\n`;
    }
    if (stats.testsGenerated !== undefined) {
        section += `- Tests Generated: ${stats.testsGenerated}\n`;
    }
    if (stats.coverageImprovement !== undefined) {
        section += `- Coverage Improvement: +${stats.coverageImprovement.toFixed(2)}%\n`;
    }

    return section ? `\n## Coverage Improvements\n${section}` : '';
}
