import fs from 'fs/promises';
import path from 'path';
import { glob } from 'fast-glob';

/**
 * Read file content
 */
export async function readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
}

/**
 * Write content to file, creating parent directories
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(filePath);
        return stat.isFile();
    } catch {
        return false;
    }
}

/**
 * Check if directory exists
 */
export async function dirExists(dirPath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(dirPath);
        return stat.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Find files matching patterns
 */
export async function findFiles(
    directory: string,
    patterns: string | string[],
    options: { ignore?: string[]; absolute?: boolean } = {}
): Promise<string[]> {
    const { ignore = [], absolute = true } = options;

    return await glob(patterns, {
        cwd: directory,
        ignore,
        absolute,
        onlyFiles: true,
    });
}
