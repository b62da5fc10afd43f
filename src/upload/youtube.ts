import { createReadStream, existsSync } from 'node:fs';
import { readFile, stat, writeFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { Auth, google } from 'googleapis';
import { z } from 'zod';
import { createLogger, errorMessage, Logger } from '../logger.js';
import { toUploadError, UploadError } from './errors.js';
import {
  authorizeInstalledApp,
  CLIENT_ENV_VARS,
  ClientConfig,
  clientConfigFromEnv,
  YOUTUBE_UPLOAD_SCOPES,
} from './oauth.js';
import { withRetry } from './retry.js';
import { Uploader, UploadRequest, UploadResult } from './types.js';

/** The one YouTube Data API call the uploader needs. */
export interface VideoInsertClient {
  insert(request: UploadRequest, onProgress: (bytesSent: number) => void): Promise<string | null | undefined>;
}

export interface YouTubeUploaderOptions {
  tokenFile?: string;
  maxRetries?: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Skips authentication and talks to this client instead. */
  client?: VideoInsertClient;
}

const storedTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
});

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export function createYouTubeInsertClient(auth: Auth.OAuth2Client): VideoInsertClient {
  const youtube = google.youtube({ version: 'v3', auth });

  return {
    async insert(request, onProgress) {
      const res = await youtube.videos.insert(
        {
          part: ['snippet', 'status'],
          requestBody: {
            snippet: {
              title: request.title,
              description: request.description,
              categoryId: request.categoryId,
              tags: request.tags,
            },
            status: {
              privacyStatus: request.privacyStatus,
            },
          },
          media: {
            mimeType: 'video/*',
            body: createReadStream(request.videoPath),
          },
        },
        {
          onUploadProgress: (evt: { bytesRead: number }) => onProgress(evt.bytesRead),
        },
      );
      return res.data.id;
    },
  };
}

/**
 * Uploads finished recordings with the YouTube Data API v3. Credentials come
 * from the token file, refreshed when expired, or from a fresh consent flow
 * using the YOUTUBE_* environment variables.
 */
export class YouTubeUploader implements Uploader {
  private client: VideoInsertClient | null;
  private readonly tokenFile: string;
  private readonly maxRetries: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly log: Logger;

  constructor(options: YouTubeUploaderOptions = {}) {
    this.client = options.client ?? null;
    this.tokenFile = resolve(options.tokenFile ?? 'token.json');
    this.maxRetries = options.maxRetries ?? 3;
    this.env = options.env ?? process.env;
    this.log = options.logger ?? createLogger('uploader');
  }

  isAuthenticated(): boolean {
    return this.client !== null;
  }

  /**
   * Resolves false, rather than throwing, when credentials are missing or
   * cannot be obtained.
   */
  async authenticate(): Promise<boolean> {
    if (this.client) return true;

    try {
      const auth = await this.obtainCredentials();
      if (!auth) return false;

      this.client = createYouTubeInsertClient(auth);
      this.log('Successfully authenticated with YouTube API');
      return true;
    } catch (error) {
      this.log('Error authenticating with YouTube API:', errorMessage(error));
      return false;
    }
  }

  async uploadVideo(request: UploadRequest): Promise<UploadResult> {
    if (!(await this.authenticate()) || !this.client) {
      return { ok: false, error: 'Not authenticated with YouTube API' };
    }
    const client = this.client;

    let size: number;
    try {
      ({ size } = await stat(request.videoPath));
    } catch (error) {
      const message = isMissingFile(error)
        ? `Video file not found: ${request.videoPath}`
        : `Cannot read video file ${request.videoPath}: ${errorMessage(error)}`;
      this.log(`Error: ${message}`);
      return { ok: false, error: message };
    }

    this.log(`Uploading video: ${basename(request.videoPath)}`);
    this.log(`Title: ${request.title}`);

    try {
      const videoId = await withRetry(
        async () => {
          this.log('Uploading file...');
          const id = await client.insert(request, (bytesSent) => {
            if (size > 0) {
              this.log(`Upload progress: ${Math.floor((bytesSent / size) * 100)}%`);
            }
          });
          if (!id) {
            throw new UploadError('Upload finished without a video id');
          }
          return id;
        },
        { maxRetries: this.maxRetries, logger: this.log },
      );

      this.log(`Video uploaded successfully! Video ID: ${videoId}`);
      this.log(`Watch at: https://www.youtube.com/watch?v=${videoId}`);
      return { ok: true, videoId };
    } catch (error) {
      const uploadError = toUploadError(error);
      this.log(
        uploadError.status !== undefined
          ? `An HTTP error ${uploadError.status} occurred: ${uploadError.message}`
          : `An error occurred during upload: ${uploadError.message}`,
      );
      return { ok: false, error: uploadError.message };
    }
  }

  private async obtainCredentials(): Promise<Auth.OAuth2Client | null> {
    const clientConfig = clientConfigFromEnv(this.env);
    const stored = await this.loadStoredToken();

    if (stored) {
      const auth = new google.auth.OAuth2(clientConfig?.clientId, clientConfig?.clientSecret);
      auth.setCredentials(stored);

      const expired = typeof stored.expiry_date === 'number' && stored.expiry_date <= Date.now();
      if (stored.access_token && !expired) {
        this.persistRefreshedTokens(auth);
        return auth;
      }

      if (stored.refresh_token && clientConfig) {
        await auth.getAccessToken();
        await this.saveToken(auth.credentials);
        this.persistRefreshedTokens(auth);
        return auth;
      }
    }

    if (!clientConfig) {
      this.logMissingClientConfig();
      return null;
    }

    return this.runConsentFlow(clientConfig);
  }

  private async runConsentFlow(clientConfig: ClientConfig): Promise<Auth.OAuth2Client> {
    const auth = await authorizeInstalledApp(clientConfig, YOUTUBE_UPLOAD_SCOPES, this.log);
    await this.saveToken(auth.credentials);
    this.persistRefreshedTokens(auth);
    return auth;
  }

  private persistRefreshedTokens(auth: Auth.OAuth2Client): void {
    auth.on('tokens', (tokens) => {
      this.saveToken({ ...auth.credentials, ...tokens }).catch((error) =>
        this.log('Failed to save refreshed token:', errorMessage(error)),
      );
    });
  }

  private async loadStoredToken(): Promise<Auth.Credentials | null> {
    if (!existsSync(this.tokenFile)) {
      return null;
    }

    try {
      const parsed = storedTokenSchema.safeParse(JSON.parse(await readFile(this.tokenFile, 'utf-8')));
      if (!parsed.success) {
        this.log(`Ignoring malformed token file ${this.tokenFile}`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.log(`Failed to read token file ${this.tokenFile}:`, errorMessage(error));
      return null;
    }
  }

  private async saveToken(credentials: Auth.Credentials): Promise<void> {
    await writeFile(this.tokenFile, JSON.stringify(credentials, null, 2));
  }

  private logMissingClientConfig(): void {
    this.log('Error: Environment variables not set');
    this.log(`Please set ${CLIENT_ENV_VARS.join(', ')}`);
    this.log('Example:');
    for (const name of CLIENT_ENV_VARS) {
      this.log(`  export ${name}='your-${name.toLowerCase().replace(/^youtube_/, '').replace(/_/g, '-')}'`);
    }
  }
}
