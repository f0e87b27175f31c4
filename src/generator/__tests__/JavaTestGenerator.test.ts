import {
    bareMethodName,
    JavaTestGenerator,
    MAX_GAPS_CONSIDERED,
    testMethodNameFor,
} from '../JavaTestGenerator';
import { CoverageGap } from '../../models/CoverageModels';
import { GeneratedTest } from '../../models/GeneratedTest';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function gap(overrides: Partial<CoverageGap> = {}): CoverageGap {
    return {
        classFullName: 'com.acme.Widget',
        methodSignature: 'render()V',
        packageName: 'com.acme',
        lineCoveragePct: 60,
        branchCoveragePct: 50,
        uncoveredLines: [11, 12],
        ...overrides,
    };
}

describe('JavaTestGenerator', () => {
    let generator: JavaTestGenerator;

    beforeEach(() => {
        generator = new JavaTestGenerator();
    });

    describe('naming', () => {
        it('should strip the descriptor from method signatures', () => {
            expect(bareMethodName('render()V')).toBe('render');
            expect(bareMethodName('apply(Ljava/lang/String;I)Z')).toBe('apply');
        });

        it('should capitalize only the first letter of the method', () => {
            expect(testMethodNameFor(gap({ methodSignature: 'getHTTPStatus()I' }), 0)).toBe('testGetHTTPStatus_Case1');
        });

        it('should keep constructor and static initializer names as JaCoCo writes them', () => {
            expect(testMethodNameFor(gap({ methodSignature: '<init>()V' }), 0)).toBe('test<init>_Case1');
            expect(testMethodNameFor(gap({ methodSignature: '<clinit>()V' }), 1)).toBe('test<clinit>_Case2');
        });

        it('should name class-level gaps after the class', () => {
            expect(testMethodNameFor(gap({ methodSignature: undefined }), 1)).toBe('testWidget_Case2');
        });
    });

    describe('generateTests', () => {
        it('should produce the requested number of cases per gap', () => {
            const tests = generator.generateTests([gap()], 3);

            expect(tests.map(t => t.testMethodName)).toEqual([
                'testRender_Case1',
                'testRender_Case2',
                'testRender_Case3',
            ]);
            expect(tests.every(t => t.testClassName === 'WidgetTest')).toBe(true);
            expect(tests.every(t => t.targetClass === 'com.acme.Widget' && t.targetMethod === 'render()V')).toBe(true);
        });

        it('should render the first case as an equality check', () => {
            const [first] = generator.generateTests([gap()], 1);

            expect(first.testBody).toBe(
                [
                    '    @Test',
                    '    public void testRender_Case1() {',
                    '        Widget instance = new Widget();',
                    '        assertNotNull(instance);',
                    '',
                    '        instance.render();',
                    '',
                    '        assertEquals(instance, instance);',
                    '    }',
                ].join('\n')
            );
        });

        it('should keep unique method names past the third case', () => {
            const tests = generator.generateTests([gap()], 5);

            expect(tests[4].testMethodName).toBe('testRender_Case5');
            expect(tests[4].testBody).toContain('public void testRender_Case5() {');
            expect(tests[4].testBody).toContain('assertTrue(result instanceof Widget);');
        });

        it('should consider only the first ten gaps', () => {
            const gaps = Array.from({ length: 12 }, (_, i) => gap({ classFullName: `com.acme.Type${i}` }));

            const tests = generator.generateTests(gaps, 2);

            expect(tests).toHaveLength(MAX_GAPS_CONSIDERED * 2);
            expect(tests[tests.length - 1].targetClass).toBe('com.acme.Type9');
        });

        it('should default to three cases per gap', () => {
            expect(generator.generateTests([gap(), gap()])).toHaveLength(6);
        });

        it('should produce nothing for no gaps or a non-positive limit', () => {
            expect(generator.generateTests([], 3)).toEqual([]);
            expect(generator.generateTests([gap()], 0)).toEqual([]);
            expect(generator.generateTests([gap()], -1)).toEqual([]);
        });
    });

    describe('formatTestFile', () => {
        const test: GeneratedTest = {
            testClassName: 'WidgetTest',
            testMethodName: 'testRender_Case1',
            testBody: '    @Test\n    public void testRender_Case1() {\n    }',
            targetClass: 'com.acme.Widget',
            targetMethod: 'render()V',
        };

        it('should assemble a complete JUnit class', () => {
            expect(generator.formatTestFile('WidgetTest', 'com.acme', [test])).toBe(
                [
                    'package com.acme.test;',
                    '',
                    'import org.junit.jupiter.api.Test;',
                    'import org.junit.jupiter.api.BeforeEach;',
                    'import static org.junit.jupiter.api.Assertions.*;',
                    'import com.acme.*;',
                    '',
                    'public class WidgetTest {',
                    '',
                    '    private Object instance;',
                    '',
                    '    @BeforeEach',
                    '    public void setUp() {',
                    '        // Initialize test fixtures',
                    '    }',
                    '',
                    '    @Test',
                    '    public void testRender_Case1() {',
                    '    }',
                    '}',
                    '',
                ].join('\n')
            );
        });

        it('should keep the last body for a repeated method name', () => {
            const replacement = { ...test, testBody: '    // replacement' };

            const file = generator.formatTestFile('WidgetTest', 'com.acme', [test, replacement]);

            expect(file).toContain('    // replacement\n}\n');
            expect(file).not.toContain('public void testRender_Case1()');
        });

        it('should use the test package and skip the wildcard import for the default package', () => {
            const file = generator.formatTestFile('MainTest', '', [test]);

            expect(file.startsWith('package test;\n\nimport org.junit.jupiter.api.Test;\n')).toBe(true);
            expect(file).toContain('import static org.junit.jupiter.api.Assertions.*;\n\npublic class MainTest {');
        });

        it('should produce a complete class without tests', () => {
            const file = generator.formatTestFile('WidgetTest', 'com.acme', []);

            expect(file.endsWith('        // Initialize test fixtures\n    }\n\n\n}\n')).toBe(true);
            expect(generator.formatTestFile('WidgetTest', 'com.acme', [])).toBe(file);
        });

        it('should separate test methods with a blank line', () => {
            const second = { ...test, testMethodName: 'testRender_Case2', testBody: '    // second' };

            const file = generator.formatTestFile('WidgetTest', 'com.acme', [test, second]);

            expect(file).toContain('    public void testRender_Case1() {\n    }\n\n    // second\n}');
        });
    });
});
