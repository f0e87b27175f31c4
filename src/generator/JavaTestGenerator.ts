import { CoverageGap } from '../models/CoverageModels';
import { GeneratedTest } from '../models/GeneratedTest';
import { renderScaffold, variantForIndex } from './ScaffoldTemplates';
import logger from '../utils/logger';

/**
 * Gaps beyond this many are ignored
 */
export const MAX_GAPS_CONSIDERED = 10;

export const DEFAULT_MAX_TESTS_PER_GAP = 3;

function capitalize(name: string): string {
    return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Last dotted segment of a fully qualified class name
 */
export function simpleClassName(classFullName: string): string {
    const segments = classFullName.split('.');
    return segments[segments.length - 1];
}

/**
 * Method name without its descriptor: `render()V` -> `render`
 */
export function bareMethodName(methodSignature: string): string {
    return methodSignature.split('(')[0];
}

export function testClassNameFor(classFullName: string): string {
    return `${simpleClassName(classFullName)}Test`;
}

export function testMethodNameFor(gap: CoverageGap, caseIndex: number): string {
    const subject = gap.methodSignature !== undefined
        ? bareMethodName(gap.methodSignature)
        : simpleClassName(gap.classFullName);
    return `test${capitalize(subject)}_Case${caseIndex + 1}`;
}

/**
 * Generates JUnit 5 scaffolds for coverage gaps
 */
export class JavaTestGenerator {

    /**
     * Generate `maxTestsPerGap` cases for each of the first ten gaps
     */
    generateTests(gaps: readonly CoverageGap[], maxTestsPerGap: number = DEFAULT_MAX_TESTS_PER_GAP): GeneratedTest[] {
        const considered = gaps.slice(0, MAX_GAPS_CONSIDERED);
        if (gaps.length > MAX_GAPS_CONSIDERED) {
            logger.info(`Limiting generation to the first ${MAX_GAPS_CONSIDERED} of ${gaps.length} gaps`);
        }

        const tests: GeneratedTest[] = [];
        for (const gap of considered) {
            tests.push(...this.generateTestsForGap(gap, maxTestsPerGap));
        }

        logger.info(`Generated ${tests.length} test scaffolds for ${considered.length} gaps`);
        return tests;
    }

    /**
     * Assemble tests into a complete JUnit test class. Later tests replace
     * earlier ones with the same method name.
     */
    formatTestFile(testClassName: string, packageName: string, tests: readonly GeneratedTest[]): string {
        const uniqueTests = new Map<string, GeneratedTest>();
        for (const test of tests) {
            uniqueTests.set(test.testMethodName, test);
        }

        const testMethods = [...uniqueTests.values()].map(t => t.testBody).join('\n\n');

        const testPackage = packageName ? `${packageName}.test` : 'test';
        const imports = [
            'import org.junit.jupiter.api.Test;',
            'import org.junit.jupiter.api.BeforeEach;',
            'import static org.junit.jupiter.api.Assertions.*;',
            ...(packageName ? [`import ${packageName}.*;`] : []),
        ];

        return [
            `package ${testPackage};`,
            '',
            ...imports,
            '',
            `public class ${testClassName} {`,
            '',
            '    private Object instance;',
            '',
            '    @BeforeEach',
            '    public void setUp() {',
            '        // Initialize test fixtures',
            '    }',
            '',
            testMethods,
            '}',
            '',
        ].join('\n');
    }

    private generateTestsForGap(gap: CoverageGap, numTests: number): GeneratedTest[] {
        const tests: GeneratedTest[] = [];
        const testClassName = testClassNameFor(gap.classFullName);
        const className = simpleClassName(gap.classFullName);
        const methodName = gap.methodSignature !== undefined ? bareMethodName(gap.methodSignature) : undefined;

        for (let i = 0; i < numTests; i++) {
            const testMethodName = testMethodNameFor(gap, i);
            tests.push({
                testClassName,
                testMethodName,
                testBody: renderScaffold(variantForIndex(i), { testMethodName, className, methodName }),
                targetClass: gap.classFullName,
                targetMethod: gap.methodSignature,
            });
        }

        return tests;
    }
}
