/**
 * Coverage kinds a JaCoCo counter can carry. Only LINE and BRANCH are
 * interpreted; the rest are listed so reports decode without surprises.
 */
export type CounterType = 'INSTRUCTION' | 'BRANCH' | 'LINE' | 'COMPLEXITY' | 'METHOD' | 'CLASS';

/**
 * A (covered, missed) pair attached to a report node
 */
export interface CoverageCounter {
    type: string;
    covered: number;
    missed: number;
}

/**
 * One method with incomplete line coverage
 */
export interface CoverageGap {
    readonly classFullName: string;
    /** Method name followed by its raw descriptor, e.g. `render()V`. Absent for class-level gaps. */
    readonly methodSignature?: string;
    /** Dotted package name, empty for the default package */
    readonly packageName: string;
    readonly lineCoveragePct: number;
    readonly branchCoveragePct: number;
    readonly uncoveredLines: readonly number[];
}

/**
 * Result of parsing one coverage report
 */
export interface CoverageReport {
    readonly totalLineCoveragePct: number;
    readonly totalBranchCoveragePct: number;
    /** Ascending by line coverage, ties in traversal order */
    readonly gaps: readonly CoverageGap[];
}
