import path from 'path';
import { ReportGenerator } from '../ReportGenerator';
import { ScaffoldRun } from '../../models/ScaffoldRun';
import * as fileUtils from '../../utils/fileUtils';

jest.mock('../../utils/fileUtils');
jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const run: ScaffoldRun = {
    runId: 'run-1',
    reportPath: '/work/target/site/jacoco/jacoco.xml',
    startTime: '2024-01-01T00:00:00.000Z',
    endTime: '2024-01-01T00:00:01.500Z',
    duration: 1500,
    maxTestsPerGap: 3,
    report: {
        totalLineCoveragePct: 60,
        totalBranchCoveragePct: 50,
        gaps: [
            {
                classFullName: 'com.acme.Box<T>',
                methodSignature: 'open()V',
                packageName: 'com.acme',
                lineCoveragePct: 60,
                branchCoveragePct: 50,
                uncoveredLines: [11, 12],
            },
        ],
    },
    tests: [],
    suites: [
        {
            testClassName: 'BoxTest',
            packageName: 'com.acme',
            filePath: '/work/src/test/java/com/acme/test/BoxTest.java',
            testCount: 3,
        },
    ],
    stats: { lineCoveragePct: 60, branchCoveragePct: 50, testsGenerated: 0, coverageGap: 40 },
};

describe('ReportGenerator', () => {
    let generator: ReportGenerator;

    beforeEach(() => {
        jest.clearAllMocks();
        jest.mocked(fileUtils.writeFile).mockResolvedValue(undefined);
        generator = new ReportGenerator();
    });

    it('should write the run as indented JSON', async () => {
        const paths = await generator.generateReports(run, '/artifacts/run-1', ['json']);

        expect(paths).toEqual({ jsonPath: path.join('/artifacts/run-1', 'results.json') });
        expect(fileUtils.writeFile).toHaveBeenCalledWith(
            path.join('/artifacts/run-1', 'results.json'),
            JSON.stringify(run, null, 2)
        );
    });

    it('should write an escaped HTML report', async () => {
        const paths = await generator.generateReports(run, '/artifacts/run-1', ['html']);

        expect(paths).toEqual({ htmlPath: path.join('/artifacts/run-1', 'results.html') });
        const html = jest.mocked(fileUtils.writeFile).mock.calls[0][1];
        expect(html).toContain('<title>Coverage Scaffold Results - run-1</title>');
        expect(html).toContain('<td><code>com.acme.Box&lt;T&gt;</code></td>');
        expect(html).toContain('<td>11, 12</td>');
        expect(html).toContain('<li>/work/src/test/java/com/acme/test/BoxTest.java (3 tests)</li>');
        expect(html).toContain('<strong>Duration:</strong> 1.50s<br>');
    });

    it('should write nothing when no format is requested', async () => {
        await expect(generator.generateReports(run, '/artifacts/run-1', [])).resolves.toEqual({});
        expect(fileUtils.writeFile).not.toHaveBeenCalled();
    });
});
