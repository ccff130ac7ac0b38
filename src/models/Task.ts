// src/models/Task.ts
import mongoose, { Schema, Document, Types } from 'mongoose';
import { TaskPriority, TaskStatus } from '../types';

export const TASK_PRIORITIES: readonly TaskPriority[] = ['High', 'Medium', 'Low'];
export const TASK_STATUSES: readonly TaskStatus[] = ['Todo', 'In progress', 'Done'];

export interface ITask extends Document {
  _id: Types.ObjectId;
  client: string;
  description: string;
  priority: TaskPriority;
  status: TaskStatus;
  createdAt: Date;
  updatedAt: Date;
}

const TaskSchema = new Schema<ITask>(
  {
    client: { type: String, required: true, trim: true },
    description: { type: String, required: true, trim: true },
    priority: { type: String, enum: [...TASK_PRIORITIES], default: 'Medium' },
    status: { type: String, enum: [...TASK_STATUSES], default: 'Todo', index: true },
  },
  {
    timestamps: true,
    collection: 'tasks',
  }
);

TaskSchema.index({ status: 1, createdAt: 1 });

export const Task = mongoose.model<ITask>('Task', TaskSchema);
