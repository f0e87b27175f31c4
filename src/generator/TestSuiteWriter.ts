import path from 'path';
import { CoverageGap } from '../models/CoverageModels';
import { GeneratedTest, WrittenSuite } from '../models/GeneratedTest';
import { JavaTestGenerator } from './JavaTestGenerator';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface TestSuite {
    testClassName: string;
    packageName: string;
    tests: GeneratedTest[];
}

/**
 * Group tests into one suite per test class and package, in first-seen order.
 * The package comes from the gap each test targets.
 */
export function groupBySuite(tests: readonly GeneratedTest[], gaps: readonly CoverageGap[]): TestSuite[] {
    const packageByClass = new Map<string, string>();
    for (const gap of gaps) {
        if (!packageByClass.has(gap.classFullName)) {
            packageByClass.set(gap.classFullName, gap.packageName);
        }
    }

    const suites = new Map<string, TestSuite>();
    for (const test of tests) {
        const packageName = packageByClass.get(test.targetClass) ?? '';
        const key = `${packageName}:${test.testClassName}`;

        let suite = suites.get(key);
        if (!suite) {
            suite = { testClassName: test.testClassName, packageName, tests: [] };
            suites.set(key, suite);
        }
        suite.tests.push(test);
    }

    return [...suites.values()];
}

/**
 * Location of a suite below the test source root: `<package path>/test/<Class>.java`
 */
export function suiteFilePath(outputDir: string, suite: TestSuite): string {
    const packageDirs = suite.packageName ? suite.packageName.split('.') : [];
    return path.join(outputDir, ...packageDirs, 'test', `${suite.testClassName}.java`);
}

/**
 * Writes assembled test classes to disk
 */
export class TestSuiteWriter {
    private generator: JavaTestGenerator;

    constructor(generator: JavaTestGenerator = new JavaTestGenerator()) {
        this.generator = generator;
    }

    async writeSuites(
        outputDir: string,
        tests: readonly GeneratedTest[],
        gaps: readonly CoverageGap[]
    ): Promise<WrittenSuite[]> {
        const written: WrittenSuite[] = [];

        for (const suite of groupBySuite(tests, gaps)) {
            const filePath = suiteFilePath(outputDir, suite);
            const content = this.generator.formatTestFile(suite.testClassName, suite.packageName, suite.tests);

            // Overloads share test method names, only the last of each survives formatting
            const testCount = new Set(suite.tests.map(t => t.testMethodName)).size;

            await writeFile(filePath, content);
            logger.info(`Wrote ${testCount} tests to ${filePath}`);

            written.push({
                testClassName: suite.testClassName,
                packageName: suite.packageName,
                filePath,
                testCount,
            });
        }

        return written;
    }
}
