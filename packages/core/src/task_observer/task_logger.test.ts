import type { Logger } from '../logger';
import { ReportTask } from '../task/task_variants';
import { TaskLogger } from './task_logger';

describe('TaskLogger', () => {
  it('should log one line per transition', () => {
    const mockLogger: jest.Mocked<Logger> = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
    };
    const taskLogger = new TaskLogger(mockLogger);
    const task = new ReportTask(3, 'Weekly report');

    taskLogger.onTransition(task, 'Pending', 'Running');
    taskLogger.onTransition(task, 'Running', 'Completed');

    expect(mockLogger.info.mock.calls).toEqual([
      ['Task 3 (Weekly report) status changed: Pending → Running'],
      ['Task 3 (Weekly report) status changed: Running → Completed'],
    ]);
  });

  it('should prefix lines with [LOG] by default', () => {
    const consoleSpy = jest.spyOn(console, 'log').mockImplementation();
    const previousLevel = process.env['LOG_LEVEL'];
    process.env['LOG_LEVEL'] = 'info';

    try {
      const taskLogger = new TaskLogger();
      taskLogger.onTransition(new ReportTask(1, 'Task 1'), 'Pending', 'Running');

      expect(consoleSpy).toHaveBeenCalledWith('[LOG] Task 1 (Task 1) status changed: Pending → Running');
    } finally {
      if (previousLevel === undefined) {
        delete process.env['LOG_LEVEL'];
      } else {
        process.env['LOG_LEVEL'] = previousLevel;
      }
      consoleSpy.mockRestore();
    }
  });
});
