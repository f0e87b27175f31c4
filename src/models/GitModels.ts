/**
 * Working tree state of a repository
 */
export interface GitStatus {
    isClean: boolean;
    currentBranch: string;
    staged: string[];
    unstaged: string[];
    untracked: string[];
    conflicts: string[];
    commitsAhead: number;
}

export interface StageResult {
    success: boolean;
    filesStaged: number;
    stagedFiles: string[];
    message: string;
}

export interface CommitResult {
    success: boolean;
    commitHash: string | null;
    message: string;
}

export interface PushResult {
    success: boolean;
    remote?: string;
    branch?: string;
    message: string;
}

export interface PullRequestResult {
    success: boolean;
    url: string | null;
    number: number | null;
    message: string;
}
