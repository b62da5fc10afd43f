import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { RecWatchApp } from '../app.js';
import { createServer } from '../server.js';
import { checkNow, getStatus, listRecordings, uploadRecording } from '../tools/index.js';
import { ToolResult } from '../tools/utils.js';
import { Uploader } from '../upload/types.js';
import { FakeEventSource, testConfig } from './helpers.js';

const parse = (result: ToolResult): unknown => JSON.parse(result.content[0].text);

describe('MCP tools', () => {
  let dir: string;
  let app: RecWatchApp;
  let uploadVideo: ReturnType<typeof vi.fn<Uploader['uploadVideo']>>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'recwatch-tools-'));
    uploadVideo = vi.fn<Uploader['uploadVideo']>(async () => ({ ok: true, videoId: 'vid123' }));
    app = new RecWatchApp({
      config: testConfig(dir),
      eventSource: new FakeEventSource(),
      uploader: { authenticate: async () => true, uploadVideo },
      logger: vi.fn(),
    });
    await app.start();
  });

  afterEach(async () => {
    await app.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it('get_status reports the app status', async () => {
    const result = await getStatus.handler({}, app);

    expect(parse(result)).toEqual({
      watchDirectory: dir,
      checkIntervalMs: 300_000,
      checkerRunning: true,
      uploaderConfigured: true,
      tracked: null,
      stats: { created: 0, finished: 0, abandoned: 0 },
      lastUpload: null,
    });
  });

  it('list_recordings honours the limit', async () => {
    await writeFile(join(dir, 'a.mp4'), 'a');
    await writeFile(join(dir, 'b.mp4'), 'b');

    const result = await listRecordings.handler({ limit: 1 }, app);

    expect(parse(result)).toMatchObject({ directory: dir, total: 1 });
  });

  it('list_recordings rejects a bad limit', async () => {
    await expect(listRecordings.handler({ limit: -2 }, app)).rejects.toThrow();
  });

  it('check_now reports an idle tracker', async () => {
    expect(parse(await checkNow.handler(undefined, app))).toEqual({ status: 'idle' });
  });

  it('upload_recording resolves relative paths against the watch directory', async () => {
    const result = await uploadRecording.handler({ path: 'a.mp4' }, app);

    expect(parse(result)).toMatchObject({ path: join(dir, 'a.mp4'), status: 'uploaded', videoId: 'vid123' });
    expect(uploadVideo).toHaveBeenCalledWith(expect.objectContaining({ videoPath: join(dir, 'a.mp4') }));
  });

  it('upload_recording accepts absolute paths inside the watch directory', async () => {
    const result = await uploadRecording.handler({ path: join(dir, 'b.mp4') }, app);

    expect(parse(result)).toMatchObject({ path: join(dir, 'b.mp4'), status: 'uploaded' });
  });

  it('upload_recording refuses files outside the watch directory', async () => {
    const outside = join(tmpdir(), 'elsewhere.mp4');

    await expect(uploadRecording.handler({ path: outside }, app)).rejects.toThrow(
      `Path is outside the watch directory: ${outside}`,
    );
    await expect(uploadRecording.handler({ path: '../escape.mp4' }, app)).rejects.toThrow(
      'Path is outside the watch directory',
    );
    expect(uploadVideo).not.toHaveBeenCalled();
  });

  describe('over an MCP connection', () => {
    let client: Client;

    beforeEach(async () => {
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      await createServer(app).connect(serverTransport);
      client = new Client({ name: 'recwatch-test', version: '1.0.0' });
      await client.connect(clientTransport);
    });

    afterEach(async () => {
      await client.close();
    });

    it('lists every tool', async () => {
      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(['get_status', 'list_recordings', 'check_now', 'upload_recording']);
    });

    it('returns argument errors as tool errors', async () => {
      const result = await client.callTool({ name: 'upload_recording', arguments: {} });

      expect(result).toEqual({ content: [{ type: 'text', text: 'Error: path: Required' }], isError: true });
      expect(uploadVideo).not.toHaveBeenCalled();
    });

    it('rejects unknown tools', async () => {
      await expect(client.callTool({ name: 'format_disk', arguments: {} })).rejects.toThrow('Unknown tool: format_disk');
    });
  });
});
