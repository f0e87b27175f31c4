import path from 'path';
import { groupBySuite, suiteFilePath, TestSuiteWriter } from '../TestSuiteWriter';
import { JavaTestGenerator } from '../JavaTestGenerator';
import { CoverageGap } from '../../models/CoverageModels';
import * as fileUtils from '../../utils/fileUtils';

jest.mock('../../utils/fileUtils');
jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const gaps: CoverageGap[] = [
    {
        classFullName: 'com.acme.Widget',
        methodSignature: 'render()V',
        packageName: 'com.acme',
        lineCoveragePct: 20,
        branchCoveragePct: 0,
        uncoveredLines: [4],
    },
    {
        classFullName: 'com.acme.Widget',
        methodSignature: 'render(I)V',
        packageName: 'com.acme',
        lineCoveragePct: 40,
        branchCoveragePct: 0,
        uncoveredLines: [9],
    },
    {
        classFullName: 'Main',
        methodSignature: 'main([Ljava/lang/String;)V',
        packageName: '',
        lineCoveragePct: 50,
        branchCoveragePct: 0,
        uncoveredLines: [],
    },
];

describe('TestSuiteWriter', () => {
    const generator = new JavaTestGenerator();

    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('groupBySuite', () => {
        it('should group tests per class in first-seen order', () => {
            const tests = generator.generateTests(gaps, 2);

            const suites = groupBySuite(tests, gaps);

            expect(suites.map(s => [s.packageName, s.testClassName, s.tests.length])).toEqual([
                ['com.acme', 'WidgetTest', 4],
                ['', 'MainTest', 2],
            ]);
        });
    });

    describe('suiteFilePath', () => {
        it('should place suites in a test directory below the package path', () => {
            expect(suiteFilePath('/out', { testClassName: 'WidgetTest', packageName: 'com.acme', tests: [] })).toBe(
                path.join('/out', 'com', 'acme', 'test', 'WidgetTest.java')
            );
            expect(suiteFilePath('/out', { testClassName: 'MainTest', packageName: '', tests: [] })).toBe(
                path.join('/out', 'test', 'MainTest.java')
            );
        });
    });

    describe('writeSuites', () => {
        it('should write one file per suite and count unique test methods', async () => {
            jest.mocked(fileUtils.writeFile).mockResolvedValue(undefined);
            const writer = new TestSuiteWriter(generator);
            const tests = generator.generateTests(gaps, 2);

            const written = await writer.writeSuites('/out', tests, gaps);

            expect(written).toEqual([
                {
                    testClassName: 'WidgetTest',
                    packageName: 'com.acme',
                    filePath: path.join('/out', 'com', 'acme', 'test', 'WidgetTest.java'),
                    testCount: 2,
                },
                {
                    testClassName: 'MainTest',
                    packageName: '',
                    filePath: path.join('/out', 'test', 'MainTest.java'),
                    testCount: 2,
                },
            ]);
            expect(fileUtils.writeFile).toHaveBeenCalledTimes(2);
            expect(fileUtils.writeFile).toHaveBeenCalledWith(
                path.join('/out', 'test', 'MainTest.java'),
                generator.formatTestFile('MainTest', '', tests.slice(4))
            );
        });
    });
});
