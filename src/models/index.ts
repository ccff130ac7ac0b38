// src/models/index.ts
export { Task } from './Task';
