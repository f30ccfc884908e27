import type { SessionTask } from '../transport/network-session.js';
import { StateError } from './errors.js';

/**
 * Two-way association between logical requests and their live tasks.
 * Callbacks arrive keyed by task; control calls arrive keyed by request.
 * At most one live task per request and one request per task.
 */
export class RequestTaskMap<R extends object> {
  private readonly tasksToRequests = new Map<SessionTask, R>();
  private readonly requestsToTasks = new Map<R, SessionTask>();

  get size(): number {
    return this.tasksToRequests.size;
  }

  get isEmpty(): boolean {
    return this.tasksToRequests.size === 0;
  }

  get requests(): R[] {
    return [...this.requestsToTasks.keys()];
  }

  requestFor(task: SessionTask): R | undefined {
    return this.tasksToRequests.get(task);
  }

  taskFor(request: R): SessionTask | undefined {
    return this.requestsToTasks.get(request);
  }

  /**
   * Associates `task` with `request`, replacing the request's previous task
   * (the retry case). A task already owned by another request is an error.
   */
  set(request: R, task: SessionTask): void {
    const owner = this.tasksToRequests.get(task);
    if (owner !== undefined && owner !== request) {
      throw new StateError(`Task ${task.taskIdentifier} is already associated with another request`);
    }

    const previous = this.requestsToTasks.get(request);
    if (previous !== undefined && previous !== task) {
      this.tasksToRequests.delete(previous);
    }

    this.requestsToTasks.set(request, task);
    this.tasksToRequests.set(task, request);
  }

  /**
   * Drops the association of a completed task. Unknown tasks are ignored.
   */
  delete(task: SessionTask): R | undefined {
    const request = this.tasksToRequests.get(task);
    if (request === undefined) return undefined;

    this.tasksToRequests.delete(task);
    if (this.requestsToTasks.get(request) === task) {
      this.requestsToTasks.delete(request);
    }
    return request;
  }

  deleteRequest(request: R): SessionTask | undefined {
    const task = this.requestsToTasks.get(request);
    if (task === undefined) return undefined;
    this.requestsToTasks.delete(request);
    this.tasksToRequests.delete(task);
    return task;
  }

  clear(): void {
    this.tasksToRequests.clear();
    this.requestsToTasks.clear();
  }
}
