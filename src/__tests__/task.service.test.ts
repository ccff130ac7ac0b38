import { Task } from '../models/Task';
import { closeTaskStore, taskService } from '../services/task.service';

describe('Task model', () => {
  test('should default new tasks to medium priority and todo', () => {
    const task = new Task({ client: ' Jasmin Hotels ', description: 'Renew umbrella' });

    expect(task.validateSync()).toBeUndefined();
    expect(task.client).toBe('Jasmin Hotels');
    expect(task.priority).toBe('Medium');
    expect(task.status).toBe('Todo');
  });

  test('should reject unknown priorities and statuses', () => {
    const task = new Task({ client: 'Jasmin Hotels', description: 'Renew umbrella', priority: 'Urgent', status: 'Blocked' });
    const error = task.validateSync();

    expect(error?.errors.priority).toBeDefined();
    expect(error?.errors.status).toBeDefined();
  });
});

describe('TaskService', () => {
  test('should not look up malformed task ids', async () => {
    await expect(taskService.updateTaskStatus('not-a-task', 'Done')).resolves.toBeNull();
  });
});

describe('closeTaskStore', () => {
  test('should report a clean disconnect', async () => {
    await expect(closeTaskStore(async () => undefined)).resolves.toBe(true);
  });

  test('should resolve false instead of rejecting when the disconnect fails', async () => {
    await expect(
      closeTaskStore(async () => {
        throw new Error('connection reset');
      })
    ).resolves.toBe(false);
  });
});
