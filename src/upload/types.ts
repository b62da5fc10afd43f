import type { PrivacyStatus } from '../config.js';

export interface UploadRequest {
  videoPath: string;
  title: string;
  description: string;
  categoryId: string;
  privacyStatus: PrivacyStatus;
  tags: string[];
}

export type UploadResult = { ok: true; videoId: string } | { ok: false; error: string };

export interface Uploader {
  uploadVideo(request: UploadRequest): Promise<UploadResult>;
}

export type DispatchStatus = 'uploaded' | 'failed' | 'skipped';

export interface DispatchOutcome {
  path: string;
  status: DispatchStatus;
  videoId?: string;
  error?: string;
  at: string;
}
