import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach } from 'vitest';
import type { Session } from '../../src/core/session.js';
import { unwrap } from '../../src/core/data-response.js';
import { DownloadFileMoveError, ExplicitlyCancelledError, SessionTaskError } from '../../src/core/errors.js';
import { suggestedDownloadDestination } from '../../src/requests/download-request.js';
import type { ProgressEvent } from '../../src/types/index.js';
import { immediateExecutor } from '../../src/utils/executor.js';
import { createMockSession, failureOf } from '../helpers/session.js';

const baseUrl = 'https://files.example.test';

function taskResumed(session: Session): Promise<void> {
  return new Promise((resolve) => {
    session.events.once('didResumeTask', () => resolve());
  });
}

describe('DownloadRequest', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'courier-download-test-'));
  });

  it('should move the file to its destination', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/report.txt', 200, 'quarterly numbers', { 'content-type': 'text/plain' });
    const target = join(directory, 'nested', 'report.txt');

    const response = await session
      .download(`${baseUrl}/report.txt`, {
        destination: () => ({ url: target, options: { createIntermediateDirectories: true } }),
      })
      .validate()
      .serializingURL();

    expect(unwrap(response)).toBe(target);
    expect(response.fileUrl).toBe(target);
    expect(await readFile(target, 'utf8')).toBe('quarterly numbers');
  });

  it('should yield the same bytes as a data request', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/payload.bin', 200, 'payload');

    const viaData = await session.request(`${baseUrl}/payload.bin`).serializingData();
    const viaDownload = await session
      .download(`${baseUrl}/payload.bin`, { destination: () => ({ url: join(directory, 'payload.bin') }) })
      .serializingData();

    expect(Buffer.from(unwrap(viaDownload)).toString('utf8')).toBe('payload');
    expect(Buffer.from(unwrap(viaDownload)).equals(Buffer.from(unwrap(viaData)))).toBe(true);
  });

  it('should fail validation on an unacceptable status code', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/gone.txt', 410, 'gone');

    const response = await session
      .download(`${baseUrl}/gone.txt`, { destination: () => ({ url: join(directory, 'gone.txt') }) })
      .validate()
      .serializingString();

    expect(failureOf(response).message).toBe('Response validation failed: unacceptable status code 410.');
  });

  it('should report a destination that cannot be written', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/report.txt', 200, 'numbers');

    const response = await session
      .download(`${baseUrl}/report.txt`, { destination: () => ({ url: join(directory, 'missing', 'report.txt') }) })
      .serializingURL();

    const error = failureOf(response);
    expect(error).toBeInstanceOf(DownloadFileMoveError);
    expect(error.kind).toBe('downloadedFileMoveFailed');
  });

  it('should replace an existing file when asked to', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/report.txt', 200, 'fresh');
    const target = join(directory, 'report.txt');
    await writeFile(target, 'stale');

    await session
      .download(`${baseUrl}/report.txt`, { destination: () => ({ url: target, options: { removePreviousFile: true } }) })
      .serializingURL();

    expect(await readFile(target, 'utf8')).toBe('fresh');
  });

  it('should name the file after Content-Disposition with the suggested destination', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/export', 200, 'a,b', { 'content-disposition': 'attachment; filename="data.csv"' });

    const response = await session
      .download(`${baseUrl}/export`, { destination: suggestedDownloadDestination(directory) })
      .serializingURL();

    expect(unwrap(response)).toBe(join(directory, 'data.csv'));
  });

  it('should report write progress', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/report.txt', 200, 'twelve bytes', { 'content-length': '12' });
    const events: ProgressEvent[] = [];

    await session
      .download(`${baseUrl}/report.txt`, { destination: () => ({ url: join(directory, 'progress.txt') }) })
      .onDownloadProgress((progress) => events.push(progress), { queue: immediateExecutor })
      .serializingURL();

    expect(events.at(-1)).toMatchObject({ loaded: 12, total: 12, percent: 100, direction: 'download' });
  });

  it('should produce resume data when cancelled and continue from it', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/big.bin', 200, 'never sent', {}, { hold: true, times: 1 });
    network.setMockResponse('GET', '/big.bin', 200, 'all bytes');

    const request = session.download(`${baseUrl}/big.bin`, { destination: () => ({ url: join(directory, 'big.bin') }) });
    const pending = request.serializingURL();
    await taskResumed(session);
    request.cancel({ byProducingResumeData: true });
    const cancelled = await pending;

    expect(failureOf(cancelled)).toBeInstanceOf(ExplicitlyCancelledError);
    const resumeData = cancelled.resumeData;
    expect(resumeData && Buffer.from(resumeData).toString('utf8')).toBe(`resume:${baseUrl}/big.bin`);
    expect(request.resumeData).toBe(resumeData);

    if (!resumeData) return;
    const resumed = await session
      .download(resumeData, { destination: () => ({ url: join(directory, 'big-resumed.bin') }) })
      .serializingString();

    expect(unwrap(resumed)).toBe('all bytes');
    expect(network.tasks.at(-1)?.originalRequest.header('range')).toBe('bytes=0-');
  });

  it('should fail when resume data cannot be read', async () => {
    const { session, network } = createMockSession();

    const response = await session.download(new TextEncoder().encode('garbage')).serializingURL();

    const error = failureOf(response);
    expect(error).toBeInstanceOf(SessionTaskError);
    if (error instanceof SessionTaskError) expect(error.code).toBe('ERR_INVALID_RESUME_DATA');
    expect(network.tasks).toHaveLength(0);
  });

  it('should keep resume data from a failed transfer', async () => {
    const { session, network } = createMockSession();
    const resumeData = new TextEncoder().encode(`resume:${baseUrl}/big.bin`);
    network.setMockError('GET', '/big.bin', new SessionTaskError('socket closed', { code: 'ECONNRESET', resumeData }));

    const request = session.download(`${baseUrl}/big.bin`);
    const response = await request.serializingURL();

    expect(failureOf(response).message).toBe('socket closed');
    expect(response.resumeData).toBe(resumeData);
  });
});
