// src/services/task.service.ts
import mongoose, { isValidObjectId } from 'mongoose';
import { logger } from '../core/logger';
import { errorMessage } from '../core/errors';
import { ITask, Task } from '../models/Task';
import { NewTask, TaskItem, TaskStatus, TaskStore, TaskSummary } from '../types';

function toTaskItem(doc: ITask): TaskItem {
  return {
    id: doc._id.toString(),
    client: doc.client,
    description: doc.description,
    priority: doc.priority,
    status: doc.status,
    createdAt: doc.createdAt,
  };
}

export class TaskService implements TaskStore {
  async addTask(task: NewTask): Promise<TaskItem> {
    const created = await Task.create({
      client: task.client,
      description: task.description,
      priority: task.priority ?? 'Medium',
    });
    logger.info('Task added', { taskId: created._id.toString(), client: task.client });
    return toTaskItem(created);
  }

  /** Oldest first, so list positions stay stable while tasks are added. */
  async listTasks(options: { includeDone?: boolean } = {}): Promise<TaskItem[]> {
    const filter = options.includeDone ? {} : { status: { $ne: 'Done' } };
    const docs = await Task.find(filter).sort({ createdAt: 1 }).exec();
    return docs.map(toTaskItem);
  }

  async updateTaskStatus(id: string, status: TaskStatus): Promise<TaskItem | null> {
    if (!isValidObjectId(id)) return null;

    const updated = await Task.findByIdAndUpdate(id, { status }, { new: true, runValidators: true }).exec();
    if (updated) {
      logger.info('Task status updated', { taskId: id, status });
    }
    return updated ? toTaskItem(updated) : null;
  }

  async summarize(): Promise<TaskSummary> {
    const groups = await Task.aggregate<{ _id: TaskStatus; count: number }>([
      { $group: { _id: '$status', count: { $sum: 1 } } },
    ]).exec();

    const byStatus: Record<TaskStatus, number> = { Todo: 0, 'In progress': 0, Done: 0 };
    for (const group of groups) {
      byStatus[group._id] = group.count;
    }

    return {
      total: groups.reduce((sum, group) => sum + group.count, 0),
      byStatus,
    };
  }
}

export const taskService = new TaskService();

/** Resolves false, after logging the error, when the connection does not close cleanly. */
export async function closeTaskStore(disconnect: () => Promise<void> = () => mongoose.disconnect()): Promise<boolean> {
  try {
    await disconnect();
    return true;
  } catch (error) {
    logger.error('Failed to close task store connection', { error: errorMessage(error) });
    return false;
  }
}
