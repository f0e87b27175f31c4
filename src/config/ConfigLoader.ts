import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { DEFAULT_CONFIG, ScaffoldConfig } from './schema';
import { ReportFormat } from '../reporter/ReportGenerator';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.gapscaffold.yml';

/**
 * Config as read from a YAML file, every section and field optional
 */
export type PartialConfig = {
    [Section in keyof ScaffoldConfig]?: Partial<ScaffoldConfig[Section]>;
};

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(section: RawSection, key: string): string | undefined {
    const value = section[key];
    return typeof value === 'string' ? value : undefined;
}

function integerField(section: RawSection, key: string): number | undefined {
    const value = section[key];
    return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

function booleanField(section: RawSection, key: string): boolean | undefined {
    const value = section[key];
    return typeof value === 'boolean' ? value : undefined;
}

function stringListField(section: RawSection, key: string): string[] | undefined {
    const value = section[key];
    if (!Array.isArray(value)) {
        return undefined;
    }
    return value.filter((item): item is string => typeof item === 'string');
}

function isReportFormat(value: string): value is ReportFormat {
    return value === 'json' || value === 'html';
}

function setIfDefined<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void {
    if (value !== undefined) {
        target[key] = value;
    }
}

/**
 * Load and validate configuration
 */
export class ConfigLoader {
    private configSource: string = 'defaults';

    /**
     * Load configuration from file or use defaults
     */
    async load(configPath?: string): Promise<ScaffoldConfig> {
        let config: PartialConfig = {};

        if (configPath) {
            config = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                config = await this.loadFromFile(defaultPath);
                this.configSource = defaultPath;
            }
        }

        const mergedConfig = this.mergeWithDefaults(config);

        this.applyEnvironmentOverrides(mergedConfig);

        logger.info(`Configuration loaded successfully from: ${this.configSource}`);
        return mergedConfig;
    }

    getConfigSource(): string {
        return this.configSource;
    }

    /**
     * Load config from file; unreadable files fall back to defaults
     */
    private async loadFromFile(filePath: string): Promise<PartialConfig> {
        try {
            const content = await fs.readFile(filePath, 'utf-8');
            const config = this.decode(yaml.load(content));
            logger.info(`Loaded config from: ${filePath}`);
            return config;
        } catch (error) {
            logger.warn(`Failed to load config from ${filePath}: ${error}`);
            return {};
        }
    }

    /**
     * Keep only fields of the expected type, unknown keys are ignored
     */
    private decode(raw: unknown): PartialConfig {
        if (!isRecord(raw)) {
            return {};
        }

        const config: PartialConfig = {};

        const report = raw.report;
        if (isRecord(report)) {
            const section: Partial<ScaffoldConfig['report']> = {};
            setIfDefined(section, 'path', stringField(report, 'path'));
            config.report = section;
        }

        const generation = raw.generation;
        if (isRecord(generation)) {
            const section: Partial<ScaffoldConfig['generation']> = {};
            setIfDefined(section, 'max_tests_per_gap', integerField(generation, 'max_tests_per_gap'));
            setIfDefined(section, 'output_dir', stringField(generation, 'output_dir'));
            config.generation = section;
        }

        const summary = raw.summary;
        if (isRecord(summary)) {
            const section: Partial<ScaffoldConfig['summary']> = {};
            setIfDefined(section, 'top_n', integerField(summary, 'top_n'));
            config.summary = section;
        }

        const output = raw.output;
        if (isRecord(output)) {
            const section: Partial<ScaffoldConfig['output']> = {};
            setIfDefined(section, 'format', stringListField(output, 'format')?.filter(isReportFormat));
            setIfDefined(section, 'artifacts_dir', stringField(output, 'artifacts_dir'));
            setIfDefined(section, 'verbose', booleanField(output, 'verbose'));
            config.output = section;
        }

        const git = raw.git;
        if (isRecord(git)) {
            const section: Partial<ScaffoldConfig['git']> = {};
            setIfDefined(section, 'remote', stringField(git, 'remote'));
            setIfDefined(section, 'base_branch', stringField(git, 'base_branch'));
            setIfDefined(section, 'exclude_patterns', stringListField(git, 'exclude_patterns'));
            config.git = section;
        }

        return config;
    }

    /**
     * Merge with default configuration
     */
    private mergeWithDefaults(config: PartialConfig): ScaffoldConfig {
        return {
            report: { ...DEFAULT_CONFIG.report, ...config.report },
            generation: { ...DEFAULT_CONFIG.generation, ...config.generation },
            summary: { ...DEFAULT_CONFIG.summary, ...config.summary },
            output: { ...DEFAULT_CONFIG.output, ...config.output },
            git: { ...DEFAULT_CONFIG.git, ...config.git },
        };
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: ScaffoldConfig): void {
        if (process.env.GAPSCAFFOLD_REPORT) {
            config.report.path = process.env.GAPSCAFFOLD_REPORT;
        }

        const maxTests = this.integerFromEnv('GAPSCAFFOLD_MAX_TESTS_PER_GAP');
        if (maxTests !== undefined) {
            config.generation.max_tests_per_gap = maxTests;
        }

        const topN = this.integerFromEnv('GAPSCAFFOLD_TOP_N');
        if (topN !== undefined) {
            config.summary.top_n = topN;
        }

        if (process.env.VERBOSE === 'true') {
            config.output.verbose = true;
        }
    }

    private integerFromEnv(name: string): number | undefined {
        const raw = process.env[name];
        if (raw === undefined || raw === '') {
            return undefined;
        }
        if (!/^-?\d+$/.test(raw.trim())) {
            logger.warn(`Ignoring ${name}=${raw}: not an integer`);
            return undefined;
        }
        return parseInt(raw, 10);
    }
}
