import { parseStringPromise } from 'xml2js';
import { CounterType, CoverageCounter, CoverageGap, CoverageReport } from '../models/CoverageModels';
import { readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

/**
 * Raised when a report cannot be opened or is not a well-formed JaCoCo document
 */
export class ReportUnreadableError extends Error {
    constructor(
        public readonly reportPath: string,
        public readonly reason: string
    ) {
        super(`Cannot read coverage report ${reportPath}: ${reason}`);
        this.name = 'ReportUnreadableError';
    }
}

/**
 * Element as produced by xml2js: attributes under `$`, child elements as arrays
 */
type XmlElement = Record<string, unknown>;

function isElement(value: unknown): value is XmlElement {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Direct children with the given tag. Empty elements come back from xml2js as
 * strings, they decode to elements without attributes.
 */
function children(element: XmlElement, tag: string): XmlElement[] {
    const value = element[tag];
    if (!Array.isArray(value)) {
        return [];
    }
    return value.map((child: unknown) => (isElement(child) ? child : {}));
}

function attribute(element: XmlElement, name: string): string | undefined {
    const attributes = element.$;
    if (!isElement(attributes)) {
        return undefined;
    }
    const value = attributes[name];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Non-numeric or negative counts decode to 0
 */
function toCount(raw: string | undefined): number {
    if (raw === undefined) {
        return 0;
    }
    const trimmed = raw.trim();
    return /^\d+$/.test(trimmed) ? Number(trimmed) : 0;
}

function toDotted(name: string): string {
    return name.replace(/[/\\]/g, '.');
}

/**
 * Parser for JaCoCo XML coverage reports
 */
export class JacocoReportParser {

    /**
     * Parse a JaCoCo XML report file
     */
    async parse(reportPath: string): Promise<CoverageReport> {
        logger.info(`Parsing JaCoCo report: ${reportPath}`);

        let content: string;
        try {
            content = await readFile(reportPath);
        } catch (error) {
            logger.error(`Failed to read coverage report ${reportPath}: ${error}`);
            throw new ReportUnreadableError(reportPath, error instanceof Error ? error.message : String(error));
        }

        return await this.parseContent(content, reportPath);
    }

    /**
     * Parse JaCoCo XML that is already in memory
     */
    async parseContent(content: string, source: string = '<inline>'): Promise<CoverageReport> {
        const root = await this.loadRoot(content, source);

        const gaps: CoverageGap[] = [];
        let totalLineCoveragePct = 0;
        let totalBranchCoveragePct = 0;

        for (const pkg of this.collectPackages(root)) {
            const rawPackageName = attribute(pkg, 'name') ?? '';
            const packageName = toDotted(rawPackageName);

            for (const cls of children(pkg, 'class')) {
                const classFullName = this.qualifyClassName(rawPackageName, attribute(cls, 'name') ?? '');

                for (const method of children(cls, 'method')) {
                    const lineCoveragePct = this.coveragePercent(method, 'LINE');
                    if (lineCoveragePct >= 100) {
                        continue;
                    }

                    gaps.push({
                        classFullName,
                        methodSignature: `${attribute(method, 'name') ?? ''}${attribute(method, 'desc') ?? ''}`,
                        packageName,
                        lineCoveragePct,
                        branchCoveragePct: this.coveragePercent(method, 'BRANCH'),
                        uncoveredLines: this.uncoveredLines(method),
                    });
                }

                // Report totals track the best covered class
                totalLineCoveragePct = Math.max(totalLineCoveragePct, this.coveragePercent(cls, 'LINE'));
                totalBranchCoveragePct = Math.max(totalBranchCoveragePct, this.coveragePercent(cls, 'BRANCH'));
            }
        }

        // Report-level counters take precedence when present
        if (this.findCounter(root, 'LINE')) {
            totalLineCoveragePct = this.coveragePercent(root, 'LINE');
        }
        if (this.findCounter(root, 'BRANCH')) {
            totalBranchCoveragePct = this.coveragePercent(root, 'BRANCH');
        }

        // Array.prototype.sort is stable, equal coverage keeps traversal order
        const sortedGaps = [...gaps].sort((a, b) => a.lineCoveragePct - b.lineCoveragePct);

        logger.info(
            `Parsed ${source}: ${sortedGaps.length} gaps, line ${totalLineCoveragePct.toFixed(2)}%, branch ${totalBranchCoveragePct.toFixed(2)}%`
        );

        return {
            totalLineCoveragePct,
            totalBranchCoveragePct,
            gaps: sortedGaps,
        };
    }

    private async loadRoot(content: string, source: string): Promise<XmlElement> {
        let parsed: unknown;
        try {
            parsed = await parseStringPromise(content);
        } catch (error) {
            logger.error(`Malformed coverage report ${source}: ${error}`);
            throw new ReportUnreadableError(source, error instanceof Error ? error.message : String(error));
        }

        if (!isElement(parsed)) {
            throw new ReportUnreadableError(source, 'document is empty');
        }

        // Any other root element reads as a report without packages
        const root = parsed.report;
        return isElement(root) ? root : {};
    }

    /**
     * Packages in document order, including those nested in groups
     */
    private collectPackages(node: XmlElement): XmlElement[] {
        const packages = children(node, 'package');
        for (const group of children(node, 'group')) {
            packages.push(...this.collectPackages(group));
        }
        return packages;
    }

    /**
     * `<package>.<class>` in dotted form, taken literally: JaCoCo's
     * `com/acme/Widget` in package `com/acme` becomes `com.acme.com.acme.Widget`
     */
    private qualifyClassName(rawPackageName: string, rawClassName: string): string {
        return toDotted(`${rawPackageName}.${rawClassName}`);
    }

    private findCounter(node: XmlElement, type: CounterType): CoverageCounter | undefined {
        const counter = children(node, 'counter').find(c => attribute(c, 'type') === type);
        if (!counter) {
            return undefined;
        }
        return {
            type,
            covered: toCount(attribute(counter, 'covered')),
            missed: toCount(attribute(counter, 'missed')),
        };
    }

    private coveragePercent(node: XmlElement, type: CounterType): number {
        const counter = this.findCounter(node, type);
        if (!counter) {
            return 0;
        }
        const total = counter.covered + counter.missed;
        return total > 0 ? (counter.covered / total) * 100 : 0;
    }

    /**
     * Lines with no covered instructions. A missing `ci` counts as uncovered.
     */
    private uncoveredLines(method: XmlElement): number[] {
        const lines: number[] = [];
        for (const line of children(method, 'line')) {
            const lineNumber = toCount(attribute(line, 'nr'));
            if (lineNumber < 1) {
                continue;
            }
            if (toCount(attribute(line, 'ci')) === 0) {
                lines.push(lineNumber);
            }
        }
        return lines;
    }
}
