/**
 * Coverage figures attached to commits and pull requests
 */
export interface CoverageStats {
    lineCoveragePct?: number;
    branchCoveragePct?: number;
    testsGenerated?: number;
    coverageGap?: number;
    coverageImprovement?: number;
}
