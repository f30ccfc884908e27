import { describe, it, expect } from 'vitest';
import { StateError } from '../../src/core/errors.js';
import { HttpRequest } from '../../src/core/request.js';
import { RequestTaskMap } from '../../src/core/request-task-map.js';
import { canTransition, type RequestState } from '../../src/requests/request.js';
import { MockNetworkSession, MockTask } from '../helpers/mock-network-session.js';

const states: RequestState[] = ['initialized', 'resumed', 'suspended', 'cancelled', 'finished'];

describe('canTransition', () => {
  it('should let initialized go anywhere', () => {
    for (const to of states) {
      expect(canTransition('initialized', to)).toBe(true);
    }
  });

  it('should treat cancelled and finished as terminal', () => {
    for (const to of states) {
      expect(canTransition('cancelled', to)).toBe(false);
      expect(canTransition('finished', to)).toBe(false);
    }
  });

  it('should toggle between resumed and suspended', () => {
    expect(canTransition('resumed', 'suspended')).toBe(true);
    expect(canTransition('suspended', 'resumed')).toBe(true);
    expect(canTransition('resumed', 'resumed')).toBe(false);
    expect(canTransition('suspended', 'suspended')).toBe(false);
  });

  it('should allow cancelling or finishing a live request', () => {
    expect(canTransition('resumed', 'cancelled')).toBe(true);
    expect(canTransition('suspended', 'cancelled')).toBe(true);
    expect(canTransition('resumed', 'finished')).toBe(true);
  });

  it('should never re-enter initialized', () => {
    expect(canTransition('resumed', 'initialized')).toBe(false);
    expect(canTransition('suspended', 'initialized')).toBe(false);
  });
});

describe('RequestTaskMap', () => {
  const network = new MockNetworkSession();
  const task = () => new MockTask(network, 'data', new HttpRequest('https://api.example.test/'));

  it('should associate requests and tasks both ways', () => {
    const map = new RequestTaskMap<object>();
    const request = {};
    const first = task();

    map.set(request, first);

    expect(map.taskFor(request)).toBe(first);
    expect(map.requestFor(first)).toBe(request);
    expect(map.size).toBe(1);
  });

  it('should replace the task of a retried request', () => {
    const map = new RequestTaskMap<object>();
    const request = {};
    const first = task();
    const second = task();

    map.set(request, first);
    map.set(request, second);

    expect(map.taskFor(request)).toBe(second);
    expect(map.requestFor(first)).toBeUndefined();
    expect(map.size).toBe(1);
  });

  it('should refuse a task owned by another request', () => {
    const map = new RequestTaskMap<object>();
    const shared = task();
    map.set({}, shared);

    expect(() => map.set({}, shared)).toThrow(StateError);
  });

  it('should drop associations by task or by request', () => {
    const map = new RequestTaskMap<object>();
    const a = {};
    const b = {};
    const taskA = task();
    const taskB = task();
    map.set(a, taskA);
    map.set(b, taskB);

    expect(map.delete(taskA)).toBe(a);
    expect(map.delete(taskA)).toBeUndefined();
    expect(map.deleteRequest(b)).toBe(taskB);
    expect(map.isEmpty).toBe(true);
    expect(map.requests).toEqual([]);
  });
});
