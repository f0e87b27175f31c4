import simpleGit, { FileStatusResult } from 'simple-git';
import { DEFAULT_EXCLUDE_PATTERNS } from '../config/schema';
import { CommandRunner } from '../executor/CommandRunner';
import { CoverageStats } from '../models/CoverageStats';
import { CommitResult, GitStatus, PullRequestResult, PushResult, StageResult } from '../models/GitModels';
import { formatCommitStats, formatPullRequestStats } from '../reporter/CoverageStats';
import logger from '../utils/logger';

const CONFLICT_CODES = new Set(['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU']);

export interface PullRequestOptions {
    title: string;
    base?: string;
    body?: string;
    stats?: CoverageStats;
}

/**
 * `dir/` matches a path prefix, `*suffix` a path suffix, anything else a substring
 */
export function isExcluded(filePath: string, patterns: readonly string[]): boolean {
    return patterns.some(pattern => {
        if (pattern.endsWith('/')) {
            return filePath.startsWith(pattern);
        }
        if (pattern.startsWith('*')) {
            return filePath.endsWith(pattern.slice(1));
        }
        return filePath.includes(pattern);
    });
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Git operations for committing generated tests and opening pull requests
 */
export class RepoManager {
    private runner: CommandRunner;

    constructor(runner: CommandRunner = new CommandRunner()) {
        this.runner = runner;
    }

    /**
     * Working tree status; throws when the path is not a git repository
     */
    async getStatus(repoPath: string): Promise<GitStatus> {
        const git = simpleGit(repoPath);
        if (!(await git.checkIsRepo())) {
            throw new Error(`${repoPath} is not a git repository`);
        }

        const status = await git.status();

        const staged: string[] = [];
        const unstaged: string[] = [];
        const untracked: string[] = [];
        const conflicts: string[] = [];

        for (const file of status.files) {
            this.classify(file, { staged, unstaged, untracked, conflicts });
        }

        const commitsAhead = status.ahead;
        const isClean =
            staged.length === 0 &&
            unstaged.length === 0 &&
            untracked.length === 0 &&
            conflicts.length === 0 &&
            commitsAhead === 0;

        return {
            isClean,
            currentBranch: status.current ?? 'unknown',
            staged,
            unstaged,
            untracked,
            conflicts,
            commitsAhead,
        };
    }

    /**
     * Stage every changed path that no exclude pattern matches
     */
    async stageAll(repoPath: string, excludePatterns: readonly string[] = DEFAULT_EXCLUDE_PATTERNS): Promise<StageResult> {
        try {
            const git = simpleGit(repoPath);
            const status = await git.status();

            const files = status.files
                .map(file => file.path)
                .filter(filePath => !isExcluded(filePath, excludePatterns));

            if (files.length > 0) {
                await git.add(files);
            }
            logger.info(`Staged ${files.length} files`);

            return {
                success: true,
                filesStaged: files.length,
                stagedFiles: files,
                message: `Staged ${files.length} files`,
            };
        } catch (error) {
            logger.error(`Failed to stage files: ${error}`);
            return {
                success: false,
                filesStaged: 0,
                stagedFiles: [],
                message: `Failed to stage changes: ${errorMessage(error)}`,
            };
        }
    }

    /**
     * Commit staged files, appending coverage statistics to the message
     */
    async commit(repoPath: string, message: string, stats?: CoverageStats): Promise<CommitResult> {
        const fullMessage = stats ? message + formatCommitStats(stats) : message;

        try {
            const git = simpleGit(repoPath);
            const result = await git.commit(fullMessage);
            if (!result.commit) {
                return { success: false, commitHash: null, message: 'Commit failed: nothing to commit' };
            }

            const commitHash = (await git.revparse(['HEAD'])).trim().slice(0, 7);
            logger.info(`Committed ${commitHash}: ${message}`);
            return { success: true, commitHash, message: `Committed with hash ${commitHash}` };
        } catch (error) {
            logger.error(`Failed to commit: ${error}`);
            return { success: false, commitHash: null, message: `Commit failed: ${errorMessage(error)}` };
        }
    }

    /**
     * Push a branch (the current one by default) and set its upstream
     */
    async push(repoPath: string, remote: string = 'origin', branch?: string): Promise<PushResult> {
        try {
            const git = simpleGit(repoPath);
            const target = branch ?? (await this.currentBranch(repoPath));

            await git.push(remote, target, ['--set-upstream']);
            logger.info(`Pushed branch: ${remote}/${target}`);

            return { success: true, remote, branch: target, message: `Pushed to ${remote}/${target}` };
        } catch (error) {
            logger.error(`Failed to push: ${error}`);
            return { success: false, message: `Push failed: ${errorMessage(error)}` };
        }
    }

    /**
     * Open a pull request with the GitHub CLI
     */
    async createPullRequest(repoPath: string, options: PullRequestOptions): Promise<PullRequestResult> {
        const base = options.base ?? 'main';

        if (!(await this.hasGitHubCli(repoPath))) {
            return {
                success: false,
                url: null,
                number: null,
                message: 'GitHub CLI (gh) not installed or not authenticated. Install it from https://cli.github.com',
            };
        }

        try {
            const currentBranch = await this.currentBranch(repoPath);
            if (currentBranch === base) {
                return {
                    success: false,
                    url: null,
                    number: null,
                    message: `Cannot create PR: already on base branch ${base}`,
                };
            }

            const body = (options.body ?? '') + (options.stats ? formatPullRequestStats(options.stats) : '');
            const result = await this.runner.execute(
                'gh',
                ['pr', 'create', '--base', base, '--title', options.title, '--body', body],
                repoPath
            );

            if (result.exitCode !== 0) {
                return {
                    success: false,
                    url: null,
                    number: null,
                    message: `PR creation failed: ${result.stderr.trim()}`,
                };
            }

            const url = result.stdout.trim();
            const match = url.match(/\/pull\/(\d+)/);
            logger.info(`Pull request created: ${url}`);

            return {
                success: true,
                url,
                number: match ? parseInt(match[1], 10) : null,
                message: `PR created: ${url}`,
            };
        } catch (error) {
            logger.error(`Failed to create pull request: ${error}`);
            return { success: false, url: null, number: null, message: `Error creating PR: ${errorMessage(error)}` };
        }
    }

    private async currentBranch(repoPath: string): Promise<string> {
        const git = simpleGit(repoPath);
        return (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    }

    private async hasGitHubCli(repoPath: string): Promise<boolean> {
        try {
            const result = await this.runner.execute('gh', ['--version'], repoPath);
            return result.exitCode === 0;
        } catch (error) {
            logger.warn(`GitHub CLI unavailable: ${error}`);
            return false;
        }
    }

    private classify(
        file: FileStatusResult,
        lists: { staged: string[]; unstaged: string[]; untracked: string[]; conflicts: string[] }
    ): void {
        const code = `${file.index}${file.working_dir}`;

        if (code === '??') {
            lists.untracked.push(file.path);
            return;
        }
        if (CONFLICT_CODES.has(code)) {
            lists.conflicts.push(file.path);
            return;
        }
        if (file.index !== ' ') {
            lists.staged.push(file.path);
        }
        if (file.working_dir !== ' ') {
            lists.unstaged.push(file.path);
        }
    }
}
