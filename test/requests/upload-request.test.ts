import { existsSync } from 'node:fs';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import { unwrap } from '../../src/core/data-response.js';
import { UploadableCreationError } from '../../src/core/errors.js';
import type { ProgressEvent } from '../../src/types/index.js';
import { immediateExecutor } from '../../src/utils/executor.js';
import { createMockSession, failureOf } from '../helpers/session.js';

const baseUrl = 'https://upload.example.test';
const encoder = new TextEncoder();

describe('UploadRequest', () => {
  it('should POST the data and report upload progress', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('POST', '/files', 201, { id: 'f1' }, { 'content-type': 'application/json' });
    const events: ProgressEvent[] = [];

    const request = session
      .upload(`${baseUrl}/files`, { kind: 'data', data: encoder.encode('hello') })
      .onUploadProgress((progress) => events.push(progress), { queue: immediateExecutor });
    const response = await request.validate().serializingJSON();

    expect(unwrap(response)).toEqual({ id: 'f1' });
    expect(events.at(-1)).toMatchObject({ loaded: 5, total: 5, percent: 100, direction: 'upload' });
    expect(request.uploadable).toEqual({ kind: 'data', data: encoder.encode('hello') });
  });

  it('should honour an explicit method', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('PUT', '/files/f1', 204, '');

    const response = await session
      .upload(`${baseUrl}/files/f1`, { kind: 'data', data: encoder.encode('hello') }, { method: 'PUT' })
      .serializingData();

    expect(unwrap(response)).toEqual(new Uint8Array(0));
    expect(network.tasks[0].kind).toBe('upload');
  });

  it('should build the body source lazily', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('POST', '/files', 200, 'stored');
    const createUploadable = vi.fn(() => ({ kind: 'data' as const, data: encoder.encode('lazy') }));

    const response = await session.upload(`${baseUrl}/files`, { createUploadable }).serializingString();

    expect(unwrap(response)).toBe('stored');
    expect(createUploadable).toHaveBeenCalledTimes(1);
    expect(network.tasks[0].upload).toEqual({ kind: 'data', data: encoder.encode('lazy') });
  });

  it('should fail without a task when the body source cannot be built', async () => {
    const { session, network } = createMockSession();

    const response = await session
      .upload(`${baseUrl}/files`, {
        createUploadable: () => {
          throw new Error('missing file');
        },
      })
      .serializingData();

    const error = failureOf(response);
    expect(error).toBeInstanceOf(UploadableCreationError);
    expect(error.message).toBe('Uploadable creation failed: missing file');
    expect(network.tasks).toHaveLength(0);
  });

  it('should remove a file source once finished when asked to', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('POST', '/files', 200, 'stored');
    const directory = await mkdtemp(join(tmpdir(), 'courier-upload-test-'));
    const path = join(directory, 'body.txt');
    await writeFile(path, 'file body');

    const request = session.upload(`${baseUrl}/files`, { kind: 'file', path }, { removeFileOnCleanup: true });
    await request.serializingString();
    await request.whenFinished();

    await vi.waitFor(() => {
      expect(existsSync(path)).toBe(false);
    });
  });

  it('should keep a file source by default', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('POST', '/files', 200, 'stored');
    const directory = await mkdtemp(join(tmpdir(), 'courier-upload-test-'));
    const path = join(directory, 'body.txt');
    await writeFile(path, 'file body');

    const request = session.upload(`${baseUrl}/files`, { kind: 'file', path });
    await request.serializingString();
    await request.whenFinished();

    expect(existsSync(path)).toBe(true);
  });
});
