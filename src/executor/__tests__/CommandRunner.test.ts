import { ChildProcess } from 'child_process';
import { PassThrough } from 'stream';
import { CommandRunner, CommandTimeoutError } from '../CommandRunner';

jest.mock('../../utils/logger');

interface FakeChild {
    child: ChildProcess;
    stdout: PassThrough;
    stderr: PassThrough;
}

function fakeChild(): FakeChild {
    const child = new ChildProcess();
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    child.stdout = stdout;
    child.stderr = stderr;
    jest.spyOn(child, 'kill').mockReturnValue(true);
    return { child, stdout, stderr };
}

function flush(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

describe('CommandRunner', () => {
    it('should capture both streams and the exit code', async () => {
        const fake = fakeChild();
        const spawnFn = jest.fn(() => fake.child);
        const runner = new CommandRunner(1000, spawnFn);

        const pending = runner.execute('mvn -q test-compile', '/p');
        fake.stdout.end('BUILD SUCCESS\n');
        fake.stderr.end('WARNING: deprecated\n');
        await flush();
        fake.child.emit('close', 0);

        const result = await pending;
        expect(spawnFn).toHaveBeenCalledWith('mvn -q test-compile', '/p');
        expect(result.exitCode).toBe(0);
        expect(result.stdout).toBe('BUILD SUCCESS\n');
        expect(result.stderr).toBe('WARNING: deprecated\n');
    });

    it('should keep a multi-byte character split across chunks intact', async () => {
        const fake = fakeChild();
        const runner = new CommandRunner(1000, () => fake.child);
        const bytes = Buffer.from('✓ Tests passed\n', 'utf8');

        const pending = runner.execute('mvn test', '/p');
        fake.stdout.write(bytes.subarray(0, 2));
        fake.stdout.end(bytes.subarray(2));
        await flush();
        fake.child.emit('close', 0);

        await expect(pending).resolves.toEqual(expect.objectContaining({ stdout: '✓ Tests passed\n' }));
    });

    it('should report a process killed by a signal as exit code 1', async () => {
        const fake = fakeChild();
        const runner = new CommandRunner(1000, () => fake.child);

        const pending = runner.execute('mvn test', '/p');
        fake.child.emit('close', null);

        await expect(pending).resolves.toEqual(expect.objectContaining({ exitCode: 1 }));
    });

    it('should kill the process and reject on timeout', async () => {
        const fake = fakeChild();
        const runner = new CommandRunner(1000, () => fake.child);

        const pending = runner.execute('mvn test', '/p', 20);

        await expect(pending).rejects.toThrow(new CommandTimeoutError('mvn test', 20));
        expect(fake.child.kill).toHaveBeenCalledWith('SIGKILL');

        // A late close after the timeout must not settle twice
        expect(() => fake.child.emit('close', 0)).not.toThrow();
    });

    it('should reject when the process cannot be started', async () => {
        const fake = fakeChild();
        const runner = new CommandRunner(1000, () => fake.child);

        const pending = runner.execute('no-such-tool', '/p');
        fake.child.emit('error', new Error('spawn no-such-tool ENOENT'));

        await expect(pending).rejects.toThrow('spawn no-such-tool ENOENT');
    });
});
