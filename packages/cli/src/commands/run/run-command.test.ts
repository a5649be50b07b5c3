import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigStore } from '@taskpool/core';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { RunCommand } from './run-command';
import type { RunSummary } from './run-command';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

type JsonOutput = {
  success: boolean;
  error?: string;
  exitCode?: number;
  data: RunSummary;
};

function lastJsonOutput(): JsonOutput {
  const calls = mockConsoleLog.mock.calls;
  return JSON.parse(String(calls[calls.length - 1]?.[0]));
}

describe('RunCommand', () => {
  let workDir: string;
  let store: ConfigStore.MemoryConfigStore;
  let dependencyService: DependencyInjectionService;
  let runCommand: RunCommand;

  function writeDocument(name: string, content: unknown): string {
    const filePath = path.join(workDir, name);
    fs.writeFileSync(filePath, typeof content === 'string' ? content : JSON.stringify(content));
    return filePath;
  }

  beforeAll(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskpool-run-'));
  });

  afterAll(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.clearAllMocks();
    store = new ConfigStore.MemoryConfigStore();
    store.setConfig({ timeUnitMs: 0 });
    dependencyService = new DependencyInjectionService({ configStore: store, env: {} });
    runCommand = new RunCommand(dependencyService);
  });

  it('should run every task and report a JSON summary', async () => {
    const file = writeDocument('tasks.json', [
      { taskId: 1, name: 'Welcome', type: 'email' },
      { taskId: 2, name: 'Nightly', type: 'backup' },
      { taskId: 3, name: 'Weekly', type: 'report' },
    ]);

    await runCommand.execute(file, { json: true, poolSize: 2 });

    expect(mockProcessExit).not.toHaveBeenCalled();
    expect(mockConsoleLog).toHaveBeenCalledTimes(1);

    const output = lastJsonOutput();
    expect(output.success).toBe(true);
    expect(output.data.poolSize).toBe(2);
    expect(output.data.total).toBe(3);
    expect(output.data.completed).toBe(3);
    expect(output.data.failed).toBe(0);
    expect(output.data.rejected).toEqual([]);
    expect(output.data.tasks.map(task => [task.taskId, task.status])).toEqual([
      [1, 'Completed'],
      [2, 'Completed'],
      [3, 'Completed'],
    ]);
    expect(output.data.tasks[0]?.history).toEqual(['Pending', 'Running', 'Completed']);
  });

  it('should log transitions and completion lines in text mode', async () => {
    const file = writeDocument('text.yaml', [
      '- taskId: 1',
      '  name: Welcome',
      '  type: email',
    ].join('\n'));

    await runCommand.execute(file, {});

    expect(mockConsoleLog).toHaveBeenCalledWith('[LOG] Task 1 (Welcome) status changed: Pending → Running');
    expect(mockConsoleLog).toHaveBeenCalledWith('[EmailTask] Sending email for Task 1');
    expect(mockConsoleLog).toHaveBeenCalledWith('[LOG] Task 1 (Welcome) status changed: Running → Completed');
    expect(mockConsoleLog).toHaveBeenCalledWith('   ✓ Task 1 (Welcome) [email] Completed');
    expect(mockConsoleLog).toHaveBeenCalledWith('✅ All 1 task(s) completed');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should take the pool size from the config store', async () => {
    store.setConfig({ poolSize: 4, timeUnitMs: 0 });
    const file = writeDocument('pool.json', [{ taskId: 1, name: 'a', type: 'report' }]);

    await runCommand.execute(file, { json: true });

    expect(lastJsonOutput().data.poolSize).toBe(4);
  });

  it('should abort on an unknown type', async () => {
    const file = writeDocument('unknown.json', [
      { taskId: 1, name: 'a', type: 'email' },
      { taskId: 2, name: 'b', type: 'fax' },
    ]);

    await runCommand.execute(file, {});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Run failed: UnknownTaskType: fax');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should skip unknown types with --skip-unknown and still exit 1', async () => {
    const file = writeDocument('skip.json', [
      { taskId: 1, name: 'a', type: 'email' },
      { taskId: 2, name: 'b', type: 'fax' },
    ]);

    await runCommand.execute(file, { json: true, skipUnknown: true });

    const output = lastJsonOutput();
    expect(output.success).toBe(false);
    expect(output.error).toBe('0 task(s) failed, 1 description(s) rejected');
    expect(output.exitCode).toBe(1);
    expect(output.data.completed).toBe(1);
    expect(output.data.rejected).toEqual([{ index: 1, type: 'fax' }]);
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should reject an invalid pool size', async () => {
    const file = writeDocument('bad-pool.json', [{ taskId: 1, name: 'a', type: 'email' }]);

    await runCommand.execute(file, { poolSize: 0 });

    expect(mockConsoleError).toHaveBeenCalledWith(
      '❌ Run failed: SchedulerConfig validation failed: poolSize: must be >= 1'
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should report a malformed description', async () => {
    const file = writeDocument('malformed.json', [{ taskId: 1, type: 'email' }]);

    await runCommand.execute(file, { json: true });

    const output = lastJsonOutput();
    expect(output.success).toBe(false);
    expect(output.error).toBe("Run failed: TaskDescription validation failed: name: must have required property 'name'");
  });

  it('should report a missing document', async () => {
    await runCommand.execute(path.join(workDir, 'missing.json'), {});

    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringMatching(/^❌ Run failed: ENOENT/));
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should print the message of errors that are not Error instances', async () => {
    jest.spyOn(dependencyService, 'loadTaskDocument').mockRejectedValueOnce({
      code: 'ENOENT',
      message: "ENOENT: no such file or directory, open 'tasks.json'",
    });

    await runCommand.execute('tasks.json', {});

    expect(mockConsoleError).toHaveBeenCalledWith(
      "❌ Run failed: ENOENT: no such file or directory, open 'tasks.json'"
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
