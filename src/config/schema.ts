import { ReportFormat } from '../reporter/ReportGenerator';

/**
 * Build output and tool caches that should never be staged
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
    '*.class',
    '*.jar',
    'target/',
    'build/',
    'dist/',
    '__pycache__/',
    '*.pyc',
    '.pytest_cache/',
    '.venv/',
    'node_modules/',
    '.coverage',
    '*.egg-info/',
];

/**
 * Configuration schema for gapscaffold
 */
export interface ScaffoldConfig {
    report: {
        path?: string; // Report file or project directory used when none is given
    };
    generation: {
        max_tests_per_gap: number;
        output_dir: string; // Test source root the suites are written below
    };
    summary: {
        top_n: number;
    };
    output: {
        format: ReportFormat[];
        artifacts_dir: string;
        verbose: boolean;
    };
    git: {
        remote: string;
        base_branch: string;
        exclude_patterns: string[];
    };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ScaffoldConfig = {
    report: {},
    generation: {
        max_tests_per_gap: 3,
        output_dir: 'src/test/java',
    },
    summary: {
        top_n: 10,
    },
    output: {
        format: ['json', 'html'],
        artifacts_dir: './artifacts',
        verbose: false,
    },
    git: {
        remote: 'origin',
        base_branch: 'main',
        exclude_patterns: [...DEFAULT_EXCLUDE_PATTERNS],
    },
};
