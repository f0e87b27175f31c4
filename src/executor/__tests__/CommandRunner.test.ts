import { EventEmitter } from 'events';
import { CommandRunner } from '../CommandRunner';

const mockSpawn = jest.fn();

jest.mock('child_process', () => ({
    spawn: (...args: unknown[]) => mockSpawn(...args),
}));
jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

class FakeChild extends EventEmitter {
    stdout = new EventEmitter();
    stderr = new EventEmitter();
    kill = jest.fn();
}

describe('CommandRunner', () => {
    let runner: CommandRunner;
    let child: FakeChild;

    beforeEach(() => {
        jest.clearAllMocks();
        runner = new CommandRunner();
        child = new FakeChild();
        mockSpawn.mockReturnValue(child);
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should collect output and the exit code', async () => {
        const pending = runner.execute('gh', ['pr', 'create'], '/repo');

        child.stdout.emit('data', Buffer.from('https://github.com/example/'));
        child.stdout.emit('data', Buffer.from('shop/pull/7'));
        child.stderr.emit('data', Buffer.from('warning'));
        child.emit('close', 0);

        await expect(pending).resolves.toMatchObject({
            exitCode: 0,
            stdout: 'https://github.com/example/shop/pull/7',
            stderr: 'warning',
        });
        expect(mockSpawn).toHaveBeenCalledWith('gh', ['pr', 'create'], expect.objectContaining({ cwd: '/repo' }));
    });

    it('should report non-zero exit codes', async () => {
        const pending = runner.execute('gh', ['--version'], '/repo');

        child.emit('close', 4);

        await expect(pending).resolves.toMatchObject({ exitCode: 4 });
    });

    it('should reject when the command cannot start', async () => {
        const pending = runner.execute('gh', ['--version'], '/repo');

        child.emit('error', new Error('spawn gh ENOENT'));

        await expect(pending).rejects.toThrow('spawn gh ENOENT');
    });

    it('should kill the command after the timeout', async () => {
        jest.useFakeTimers();
        const pending = runner.execute('gh', ['pr', 'create'], '/repo', 1000);

        jest.advanceTimersByTime(1000);

        await expect(pending).rejects.toThrow('Command timed out after 1000ms');
        expect(child.kill).toHaveBeenCalled();
    });
});
