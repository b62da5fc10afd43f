import { createServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { Auth, google } from 'googleapis';
import { Logger } from '../logger.js';

export const YOUTUBE_UPLOAD_SCOPES = ['https://www.googleapis.com/auth/youtube.upload'];

export interface ClientConfig {
  clientId: string;
  clientSecret: string;
  projectId: string;
}

export const CLIENT_ENV_VARS = ['YOUTUBE_CLIENT_ID', 'YOUTUBE_CLIENT_SECRET', 'YOUTUBE_PROJECT_ID'] as const;

export function clientConfigFromEnv(env: NodeJS.ProcessEnv): ClientConfig | null {
  const clientId = env.YOUTUBE_CLIENT_ID;
  const clientSecret = env.YOUTUBE_CLIENT_SECRET;
  const projectId = env.YOUTUBE_PROJECT_ID;

  if (!clientId || !clientSecret || !projectId) {
    return null;
  }

  return { clientId, clientSecret, projectId };
}

/**
 * Installed-app consent flow: serves a one-shot loopback redirect on an
 * ephemeral port, prints the consent URL and exchanges the returned code.
 */
export async function authorizeInstalledApp(
  clientConfig: ClientConfig,
  scopes: string[],
  log: Logger,
): Promise<Auth.OAuth2Client> {
  let settle: { resolve: (code: string) => void; reject: (error: Error) => void } = {
    resolve: () => {},
    reject: () => {},
  };
  const codeReceived = new Promise<string>((resolve, reject) => {
    settle = { resolve, reject };
  });

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const code = url.searchParams.get('code');
    const error = url.searchParams.get('error');

    if (code) {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('Authorization complete. You can close this window.');
      settle.resolve(code);
    } else {
      res.writeHead(400, { 'Content-Type': 'text/plain' });
      res.end('Authorization failed.');
      settle.reject(new Error(`Authorization failed: ${error ?? 'no code received'}`));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });

  try {
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Loopback server has no TCP address');
    }

    const client = new google.auth.OAuth2(clientConfig.clientId, clientConfig.clientSecret, `http://localhost:${address.port}`);

    const authUrl = client.generateAuthUrl({ access_type: 'offline', scope: scopes });
    log('Authorize this app by visiting this URL:');
    log(`  ${authUrl}`);

    const code = await codeReceived;
    const { tokens } = await client.getToken(code);
    client.setCredentials(tokens);
    return client;
  } finally {
    server.close();
  }
}
