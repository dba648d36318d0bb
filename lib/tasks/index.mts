/**
 * Tasks - Public API
 */

export { TaskSupervisor, type TaskBody } from './TaskSupervisor.mjs';
