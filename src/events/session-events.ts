/**
 * Session notifications
 * Event-emitter view of task state changes, for code that prefers
 * listeners over implementing an event monitor.
 */

import { EventEmitter } from 'events';
import type { Request } from '../requests/request.js';
import type { SessionTask } from '../transport/network-session.js';
import type { EventMonitor } from './event-monitor.js';

/**
 * Events emitted by every session
 */
export interface SessionEvents {
  /** A request resumed its task */
  didResumeTask: (request: Request, task: SessionTask) => void;

  /** A request suspended its task */
  didSuspendTask: (request: Request, task: SessionTask) => void;

  /** A request cancelled its task */
  didCancelTask: (request: Request, task: SessionTask) => void;

  /** A task of a request completed, with or without an error */
  didCompleteTask: (request: Request, task: SessionTask, error: Error | undefined) => void;
}

/**
 * Type-safe event emitter for session events. Registered on every session
 * as an event monitor; listen through `session.events`.
 */
export class SessionEventEmitter extends EventEmitter implements EventMonitor {
  on<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this {
    return super.on(event, listener);
  }

  once<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this {
    return super.once(event, listener);
  }

  emit<E extends keyof SessionEvents>(event: E, ...args: Parameters<SessionEvents[E]>): boolean {
    return super.emit(event, ...args);
  }

  off<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this {
    return super.off(event, listener);
  }

  requestDidResumeTask(request: Request, task: SessionTask): void {
    this.emit('didResumeTask', request, task);
  }

  requestDidSuspendTask(request: Request, task: SessionTask): void {
    this.emit('didSuspendTask', request, task);
  }

  requestDidCancelTask(request: Request, task: SessionTask): void {
    this.emit('didCancelTask', request, task);
  }

  requestDidCompleteTask(request: Request, task: SessionTask, error: Error | undefined): void {
    this.emit('didCompleteTask', request, task, error);
  }
}
