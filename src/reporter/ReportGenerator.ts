import { ScaffoldRun } from '../models/ScaffoldRun';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import path from 'path';

export type ReportFormat = 'json' | 'html';

/**
 * Generates run reports for a parse/generate run
 */
export class ReportGenerator {
    /**
     * Generate reports
     */
    async generateReports(
        run: ScaffoldRun,
        outputDir: string,
        formats: ReportFormat[]
    ): Promise<{ jsonPath?: string; htmlPath?: string }> {
        const paths: { jsonPath?: string; htmlPath?: string } = {};

        if (formats.includes('json')) {
            paths.jsonPath = await this.generateJSON(run, outputDir);
        }

        if (formats.includes('html')) {
            paths.htmlPath = await this.generateHTML(run, outputDir);
        }

        return paths;
    }

    private async generateJSON(run: ScaffoldRun, outputDir: string): Promise<string> {
        const jsonPath = path.join(outputDir, 'results.json');
        const content = JSON.stringify(run, null, 2);
        await writeFile(jsonPath, content);
        logger.info(`JSON report generated: ${jsonPath}`);
        return jsonPath;
    }

    private async generateHTML(run: ScaffoldRun, outputDir: string): Promise<string> {
        const htmlPath = path.join(outputDir, 'results.html');
        const html = this.buildHTML(run);
        await writeFile(htmlPath, html);
        logger.info(`HTML report generated: ${htmlPath}`);
        return htmlPath;
    }

    /**
     * Build HTML content
     */
    private buildHTML(run: ScaffoldRun): string {
        const { report } = run;

        return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Coverage Scaffold Results - ${run.runId}</title>
    <style>
        * { margin: 0; padding: 0; box-sizing: border-box; }
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif;
            background: #f3f4f6;
            padding: 20px;
        }
        .container {
            max-width: 1200px;
            margin: 0 auto;
            background: white;
            border-radius: 8px;
            box-shadow: 0 1px 3px rgba(0,0,0,0.1);
            padding: 30px;
        }
        h1 { color: #111827; margin-bottom: 10px; }
        h2 { color: #111827; margin: 30px 0 15px; }
        .summary {
            display: grid;
            grid-template-columns: repeat(auto-fit, minmax(200px, 1fr));
            gap: 20px;
            margin: 30px 0;
        }
        .summary-card {
            background: #f9fafb;
            padding: 20px;
            border-radius: 8px;
            border: 1px solid #e5e7eb;
        }
        .summary-card h3 { color: #6b7280; font-size: 14px; margin-bottom: 8px; }
        .summary-card .value { color: #111827; font-size: 32px; font-weight: 700; }
        .info { color: #6b7280; font-size: 14px; margin-top: 10px; }
        .gap-table { width: 100%; border-collapse: collapse; }
        .gap-table th, .gap-table td {
            text-align: left;
            padding: 12px;
            border-bottom: 1px solid #e5e7eb;
        }
        .gap-table th { background: #f9fafb; font-weight: 600; color: #374151; }
        code, .generated-files li { font-family: 'Courier New', monospace; font-size: 13px; }
        .generated-files {
            margin-top: 20px;
            padding: 15px;
            background: #eff6ff;
            border-radius: 6px;
            border: 1px solid #dbeafe;
        }
        .generated-files ul { list-style: none; padding-left: 0; }
        .generated-files li { color: #1e3a8a; padding: 4px 0; border-bottom: 1px solid #dbeafe; }
        .generated-files li:last-child { border-bottom: none; }
    </style>
</head>
<body>
    <div class="container">
        <h1>Coverage Scaffold Results</h1>

        <div class="summary">
            <div class="summary-card">
                <h3>Line Coverage</h3>
                <div class="value">${report.totalLineCoveragePct.toFixed(2)}%</div>
            </div>
            <div class="summary-card">
                <h3>Branch Coverage</h3>
                <div class="value">${report.totalBranchCoveragePct.toFixed(2)}%</div>
            </div>
            <div class="summary-card">
                <h3>Methods With Gaps</h3>
                <div class="value">${report.gaps.length}</div>
            </div>
            <div class="summary-card">
                <h3>Tests Generated</h3>
                <div class="value">${run.tests.length}</div>
            </div>
        </div>

        <div class="info">
            <strong>Run ID:</strong> ${run.runId}<br>
            <strong>Report:</strong> ${this.escapeHtml(run.reportPath)}<br>
            <strong>Duration:</strong> ${(run.duration / 1000).toFixed(2)}s<br>
            <strong>Tests Per Gap:</strong> ${run.maxTestsPerGap}
        </div>

        <h2>Coverage Gaps</h2>
        <table class="gap-table">
            <thead>
                <tr>
                    <th>Class</th>
                    <th>Method</th>
                    <th>Line %</th>
                    <th>Branch %</th>
                    <th>Uncovered Lines</th>
                </tr>
            </thead>
            <tbody>
                ${report.gaps.map(gap => `
                <tr>
                    <td><code>${this.escapeHtml(gap.classFullName)}</code></td>
                    <td><code>${this.escapeHtml(gap.methodSignature ?? '')}</code></td>
                    <td>${gap.lineCoveragePct.toFixed(2)}</td>
                    <td>${gap.branchCoveragePct.toFixed(2)}</td>
                    <td>${gap.uncoveredLines.join(', ')}</td>
                </tr>
                `).join('')}
            </tbody>
        </table>

        ${run.suites.length > 0 ? `
        <div class="generated-files">
            <h4>Generated Test Classes (${run.suites.length})</h4>
            <ul>
                ${run.suites.map(suite => `<li>${this.escapeHtml(suite.filePath)} (${suite.testCount} tests)</li>`).join('')}
            </ul>
        </div>
        ` : ''}
    </div>
</body>
</html>`;
    }

    /**
     * Escape HTML
     */
    private escapeHtml(text: string): string {
        const map: { [key: string]: string } = {
            '&': '&amp;',
            '<': '&lt;',
            '>': '&gt;',
            '"': '&quot;',
            "'": '&#039;',
        };
        return text.replace(/[&<>"']/g, m => map[m]);
    }
}
