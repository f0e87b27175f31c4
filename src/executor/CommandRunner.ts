import { spawn } from 'child_process';
import logger from '../utils/logger';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    duration: number;
}

/**
 * Executes external commands and captures output
 */
export class CommandRunner {
    /**
     * Execute a command. Arguments are passed as-is, no shell is involved.
     */
    async execute(
        command: string,
        args: string[],
        cwd: string,
        timeout: number = 60000
    ): Promise<CommandResult> {
        const startTime = Date.now();

        logger.info(`Executing command: ${command} ${args.join(' ')} in ${cwd}`);

        return new Promise((resolve, reject) => {
            const child = spawn(command, args, {
                cwd,
                env: { ...process.env, FORCE_COLOR: '0' },
            });

            let stdout = '';
            let stderr = '';

            child.stdout?.on('data', (data: Buffer) => {
                stdout += data.toString();
            });

            child.stderr?.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            const timeoutId = setTimeout(() => {
                child.kill();
                reject(new Error(`Command timed out after ${timeout}ms`));
            }, timeout);

            child.on('close', (code: number | null) => {
                clearTimeout(timeoutId);
                const duration = Date.now() - startTime;

                logger.info(`Command completed with exit code ${code} in ${duration}ms`);
                resolve({
                    exitCode: code ?? 0,
                    stdout,
                    stderr,
                    duration,
                });
            });

            child.on('error', (error: Error) => {
                clearTimeout(timeoutId);
                logger.error(`Command execution error: ${error}`);
                reject(error);
            });
        });
    }
}
