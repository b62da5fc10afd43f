import { describe, it, expect, vi } from 'vitest';
import { CompletionDispatcher, formatTitle } from '../upload/dispatcher.js';
import { Uploader } from '../upload/types.js';

const finishedAt = new Date(2024, 2, 9, 10, 0, 0);

describe('formatTitle', () => {
  it('formats the date as MM/DD/YYYY', () => {
    expect(formatTitle(new Date(2024, 0, 5))).toBe('01/05/2024');
    expect(formatTitle(new Date(2023, 11, 31, 23, 59))).toBe('12/31/2023');
  });
});

describe('CompletionDispatcher', () => {
  it('skips the upload when no uploader is configured', async () => {
    const logger = vi.fn();
    const dispatcher = new CompletionDispatcher({ logger, now: () => finishedAt });

    const outcome = await dispatcher.dispatch('/videos/a.mp4');

    expect(outcome).toEqual({ path: '/videos/a.mp4', status: 'skipped', at: finishedAt.toISOString() });
    expect(dispatcher.lastResult).toEqual(outcome);
    expect(logger).toHaveBeenCalledWith('Recording finished: /videos/a.mp4');
    expect(logger).toHaveBeenCalledWith('No uploader configured, skipping upload');
  });

  it('uploads a finished recording as a private video titled with the date', async () => {
    const uploadVideo = vi.fn<Uploader['uploadVideo']>(async () => ({ ok: true, videoId: 'vid123' }));
    const logger = vi.fn();
    const dispatcher = new CompletionDispatcher({ uploader: { uploadVideo }, logger, now: () => finishedAt });

    const outcome = await dispatcher.dispatch('/videos/a.mp4');

    expect(uploadVideo).toHaveBeenCalledWith({
      videoPath: '/videos/a.mp4',
      title: '03/09/2024',
      description: 'Auto-uploaded recording: 03/09/2024',
      categoryId: '22',
      privacyStatus: 'private',
      tags: [],
    });
    expect(outcome).toEqual({
      path: '/videos/a.mp4',
      status: 'uploaded',
      videoId: 'vid123',
      at: finishedAt.toISOString(),
    });
    expect(logger).toHaveBeenCalledWith('Successfully uploaded video: vid123');
  });

  it('applies configured upload defaults', async () => {
    const uploadVideo = vi.fn<Uploader['uploadVideo']>(async () => ({ ok: true, videoId: 'vid456' }));
    const dispatcher = new CompletionDispatcher({
      uploader: { uploadVideo },
      defaults: { privacyStatus: 'unlisted', categoryId: '20', tags: ['obs'] },
      logger: vi.fn(),
      now: () => finishedAt,
    });

    await dispatcher.dispatch('/videos/a.mp4');

    expect(uploadVideo).toHaveBeenCalledWith(
      expect.objectContaining({ privacyStatus: 'unlisted', categoryId: '20', tags: ['obs'] }),
    );
  });

  it('logs a failed upload without throwing', async () => {
    const uploadVideo = vi.fn<Uploader['uploadVideo']>(async () => ({ ok: false, error: 'Service Unavailable' }));
    const logger = vi.fn();
    const dispatcher = new CompletionDispatcher({ uploader: { uploadVideo }, logger, now: () => finishedAt });

    await expect(dispatcher.dispatch('/videos/a.mp4')).resolves.toEqual({
      path: '/videos/a.mp4',
      status: 'failed',
      error: 'Service Unavailable',
      at: finishedAt.toISOString(),
    });
    expect(logger).toHaveBeenCalledWith('Failed to upload video: Service Unavailable');
  });

  it('contains an uploader that throws', async () => {
    const uploadVideo = vi.fn<Uploader['uploadVideo']>(async () => {
      throw new Error('token revoked');
    });
    const dispatcher = new CompletionDispatcher({ uploader: { uploadVideo }, logger: vi.fn(), now: () => finishedAt });

    const outcome = await dispatcher.dispatch('/videos/a.mp4');

    expect(outcome.status).toBe('failed');
    expect(outcome.error).toBe('token revoked');
  });

  it('can gain and lose its uploader', async () => {
    const dispatcher = new CompletionDispatcher({ logger: vi.fn() });
    expect(dispatcher.hasUploader()).toBe(false);

    dispatcher.setUploader({ uploadVideo: async () => ({ ok: true, videoId: 'vid' }) });
    expect(dispatcher.hasUploader()).toBe(true);

    dispatcher.setUploader(null);
    expect(dispatcher.hasUploader()).toBe(false);
  });
});
