import { describe, it, expect } from 'vitest';
import { EXIT_NOT_FOUND, classifyCleanup, outputTail, runCommand } from '../services/command.service';
import { fail, ok } from './fakes';

describe('classifyCleanup', () => {
  it('should treat success as done', () => {
    expect(classifyCleanup(ok('removed'))).toBe('done');
  });

  it('should treat "nothing to remove" errors as absent', () => {
    expect(classifyCleanup(fail(1, 'Error: No such container: abc123'))).toBe('absent');
    expect(classifyCleanup(fail(1, 'no configuration file provided: not found'))).toBe('absent');
    expect(classifyCleanup(fail(1, 'error: no resource found'))).toBe('absent');
  });

  it('should treat a missing binary as degraded', () => {
    expect(classifyCleanup(fail(EXIT_NOT_FOUND, 'docker: not found'))).toBe('degraded');
  });

  it('should treat other failures as degraded', () => {
    expect(classifyCleanup(fail(1, 'Cannot connect to the Docker daemon'))).toBe('degraded');
    expect(classifyCleanup(fail(137))).toBe('degraded');
  });
});

describe('outputTail', () => {
  it('should join stdout and stderr and keep the last lines', () => {
    const result = { ok: false, exitCode: 1, stdout: 'one\ntwo\n', stderr: 'three\nfour\n' };

    expect(outputTail(result)).toBe('one\ntwo\nthree\nfour');
    expect(outputTail(result, 2)).toBe('three\nfour');
  });

  it('should return an empty string for silent commands', () => {
    expect(outputTail(fail(1))).toBe('');
  });
});

describe('runCommand', () => {
  it('should report a missing binary as exit code 127', async () => {
    const result = await runCommand('lakestack-no-such-binary', ['--version']);

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(EXIT_NOT_FOUND);
    expect(result.stderr).toContain('lakestack-no-such-binary');
  });

  it('should capture output and a non-zero exit code', async () => {
    const result = await runCommand(process.execPath, [
      '-e',
      'process.stdout.write("hello"); process.stderr.write("oops"); process.exit(3)',
    ]);

    expect(result).toEqual({ ok: false, exitCode: 3, stdout: 'hello', stderr: 'oops' });
  });

  it('should stop a command that runs past its timeout', async () => {
    const result = await runCommand(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], {
      timeoutMs: 200,
    });

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(124);
    expect(result.stderr).toContain('timed out after 200ms');
  });
});
