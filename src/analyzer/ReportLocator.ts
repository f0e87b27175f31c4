import path from 'path';
import { ReportUnreadableError } from './JacocoReportParser';
import { dirExists, fileExists, findFiles } from '../utils/fileUtils';
import logger from '../utils/logger';

/**
 * Conventional report locations, checked before falling back to a search
 */
export const STANDARD_REPORT_PATHS = [
    path.join('target', 'site', 'jacoco', 'jacoco.xml'),                       // Maven
    path.join('build', 'reports', 'jacoco', 'test', 'jacocoTestReport.xml'),   // Gradle
];

const SEARCH_PATTERN = '**/jacoco*.xml';
const SEARCH_IGNORE = ['**/node_modules/**', '**/.git/**'];

/**
 * Resolves a report path or project directory to a JaCoCo XML file
 */
export class ReportLocator {

    async locate(input: string): Promise<string> {
        const resolved = path.resolve(input);

        if (await fileExists(resolved)) {
            return resolved;
        }

        if (!(await dirExists(resolved))) {
            throw new ReportUnreadableError(resolved, 'no such file or directory');
        }

        for (const candidate of STANDARD_REPORT_PATHS) {
            const reportPath = path.join(resolved, candidate);
            if (await fileExists(reportPath)) {
                logger.info(`Found JaCoCo report at ${reportPath}`);
                return reportPath;
            }
        }

        const matches = await findFiles(resolved, SEARCH_PATTERN, { ignore: SEARCH_IGNORE });
        if (matches.length === 0) {
            logger.warn(`No JaCoCo report found under ${resolved}`);
            throw new ReportUnreadableError(resolved, 'no JaCoCo XML report found in directory');
        }

        const [first] = [...matches].sort();
        if (matches.length > 1) {
            logger.warn(`Found ${matches.length} JaCoCo reports under ${resolved}, using ${first}`);
        }
        return first;
    }
}
