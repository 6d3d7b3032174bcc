import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { WorkspaceLockedError } from '@lakestack/blueprint';
import { LOG_DIR_ENV, createCommandLogger, getLogPath, logFullError, logOutput } from '../logger';

describe('logger', () => {
  it('should write to the directory named by the environment', () => {
    const dir = process.env[LOG_DIR_ENV];

    expect(dir).toBeDefined();
    expect(getLogPath()).toBe(path.join(dir ?? '', 'debug.log'));
  });

  it('should prefix entries with the command name', () => {
    const marker = `marker-${process.pid}-${Date.now()}`;
    createCommandLogger('generate').info(marker, { files: 6 });

    const content = fs.readFileSync(getLogPath(), 'utf-8');
    expect(content).toContain(`[INFO] [generate] ${marker}\n  Data: {\n    "files": 6\n  }\n`);
  });

  it('should write warnings and errors at their own levels', () => {
    const marker = `marker-${process.pid}-${Date.now()}-levels`;
    const log = createCommandLogger('up');
    log.warn(`${marker} slow`);
    log.error(`${marker} failed`, 'exit 17');

    const content = fs.readFileSync(getLogPath(), 'utf-8');
    expect(content).toContain(`[WARN] [up] ${marker} slow\n`);
    expect(content).toContain(`[ERROR] [up] ${marker} failed\n  Data: exit 17\n`);
  });

  it('should record the stable code of a failed command', () => {
    const marker = `marker-${process.pid}-${Date.now()}-code`;
    logFullError(marker, new WorkspaceLockedError('/work/trino.lock'));

    const content = fs.readFileSync(getLogPath(), 'utf-8');
    expect(content).toContain(`[ERROR] Error in ${marker}\n`);
    expect(content).toContain('"errorName": "WorkspaceLockedError"');
    expect(content).toContain('"errorCode": "WORKSPACE_LOCKED"');
  });

  it('should skip empty command output', () => {
    const marker = `marker-${process.pid}-${Date.now()}-output`;
    logOutput('stderr', `  ${marker}\n\n`);
    logOutput('stdout', '   \n');

    const content = fs.readFileSync(getLogPath(), 'utf-8');
    expect(content).toContain(`[STDERR] ${marker}\n`);
  });
});
