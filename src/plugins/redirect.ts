import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';
import type { SessionTask } from '../transport/network-session.js';

/**
 * Decides what happens when a task is about to follow a redirect. Return
 * the request to follow (possibly modified), or null to stop and surface
 * the 3xx response as the task's final response.
 */
export interface RedirectHandler {
  taskWillBeRedirected(
    task: SessionTask,
    request: HttpRequest,
    response: HttpResponse
  ): HttpRequest | null | Promise<HttpRequest | null>;
}

export type RedirectModifier = (
  task: SessionTask,
  request: HttpRequest,
  response: HttpResponse
) => HttpRequest | null | Promise<HttpRequest | null>;

export type RedirectBehavior =
  | { kind: 'follow' }
  | { kind: 'doNotFollow' }
  | { kind: 'modify'; modifier: RedirectModifier };

export class Redirector implements RedirectHandler {
  static readonly follow = new Redirector({ kind: 'follow' });
  static readonly doNotFollow = new Redirector({ kind: 'doNotFollow' });

  static modify(modifier: RedirectModifier): Redirector {
    return new Redirector({ kind: 'modify', modifier });
  }

  constructor(readonly behavior: RedirectBehavior) {}

  taskWillBeRedirected(task: SessionTask, request: HttpRequest, response: HttpResponse): HttpRequest | null | Promise<HttpRequest | null> {
    switch (this.behavior.kind) {
      case 'follow':
        return request;
      case 'doNotFollow':
        return null;
      case 'modify':
        return this.behavior.modifier(task, request, response);
    }
  }
}
