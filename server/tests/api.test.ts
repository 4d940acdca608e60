import request from 'supertest';
import { vi } from 'vitest';
import { createApp } from '../src/app.js';
import type { FileInfoProvider } from '../src/services/file-info-provider.js';
import { TeraboxClient } from '../src/services/terabox.js';
import { UPSTREAM_PATHS } from '../src/utils/constants.js';
import { createFakeUpstream, sampleEntry } from './helpers/upstream.js';

const SHARE_URL = 'https://www.terabox.com/s/abc123';

function createUpstreamApp() {
  const upstream = createFakeUpstream({
    [UPSTREAM_PATHS.LIST]: { status: 200, data: { errno: 0, list: [sampleEntry] } },
    [UPSTREAM_PATHS.DOWNLOAD]: { status: 302, headers: { location: 'https://example/direct' } }
  });
  const app = createApp({ provider: new TeraboxClient(upstream.http) });
  return { app, calls: upstream.calls };
}

function createStubbedApp() {
  const getFileInfo = vi.fn<FileInfoProvider['getFileInfo']>();
  const app = createApp({ provider: { getFileInfo } });
  return { app, getFileInfo };
}

describe('Служебные маршруты', () => {
  it('описывает сервис', async () => {
    const { app } = createStubbedApp();

    const response = await request(app)
      .get('/')
      .set('X-Forwarded-Host', 'api.example.test')
      .set('X-Forwarded-Proto', 'https');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      name: 'Terabox Downloader API',
      version: '1.0',
      endpoints: { download: '/api/download', info: '/api/info', health: '/health' },
      usage: {
        method: 'POST',
        url: 'https://api.example.test/api/download',
        body: { url: 'https://terabox.com/s/xxxxx' }
      }
    });
  });

  it('отвечает на проверку состояния без обращения к провайдеру', async () => {
    const { app, getFileInfo } = createStubbedApp();

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'healthy', message: 'API is running' });
    expect(getFileInfo).not.toHaveBeenCalled();
  });

  it('возвращает JSON 404 для неизвестных путей', async () => {
    const { app } = createStubbedApp();

    const response = await request(app).get('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, message: 'Not found' });
  });
});

describe('Проверка параметра url', () => {
  it('требует url в теле POST-запроса', async () => {
    const { app, getFileInfo } = createStubbedApp();

    const response = await request(app).post('/api/download').send({});

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, message: 'URL parameter is required' });
    expect(getFileInfo).not.toHaveBeenCalled();
  });

  it('требует url в строке GET-запроса', async () => {
    const { app } = createStubbedApp();

    const response = await request(app).get('/api/info');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, message: 'URL parameter is required' });
  });

  it('считает пустую строку и null отсутствующим параметром', async () => {
    const { app, getFileInfo } = createStubbedApp();

    const empty = await request(app).post('/api/info').send({ url: '' });
    const nullUrl = await request(app).post('/api/download').send({ url: null });
    const emptyQuery = await request(app).get('/api/download?url=');

    expect(empty.status).toBe(400);
    expect(nullUrl.status).toBe(400);
    expect(emptyQuery.status).toBe(400);
    expect(emptyQuery.body).toEqual({ success: false, message: 'URL parameter is required' });
    expect(getFileInfo).not.toHaveBeenCalled();
  });

  it('передаёт строку из пробелов дальше и отвечает 200', async () => {
    const { app, calls } = createUpstreamApp();

    const response = await request(app).post('/api/download').send({ url: '   ' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: false, message: 'Invalid Terabox URL' });
    expect(calls).toHaveLength(0);
  });

  it('отвечает 200 с ошибкой, если url не строка', async () => {
    const { app, getFileInfo } = createStubbedApp();

    const numeric = await request(app).post('/api/download').send({ url: 12345 });
    const repeated = await request(app).get('/api/info?url=a&url=b');

    expect(numeric.status).toBe(200);
    expect(numeric.body).toEqual({ success: false, message: 'Error: URL parameter must be a string' });
    expect(repeated.status).toBe(200);
    expect(repeated.body).toEqual({ success: false, message: 'Error: URL parameter must be a string' });
    expect(getFileInfo).not.toHaveBeenCalled();
  });

  it('сообщает о ссылке без токена с кодом 200', async () => {
    const { app, calls } = createUpstreamApp();

    const response = await request(app)
      .get('/api/download')
      .query({ url: 'https://example.com/nothing' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: false, message: 'Invalid Terabox URL' });
    expect(calls).toHaveLength(0);
  });

  it('отклоняет некорректный JSON', async () => {
    const { app } = createStubbedApp();

    const response = await request(app)
      .post('/api/download')
      .set('Content-Type', 'application/json')
      .send('{"url":');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, message: 'Invalid request body' });
  });

  it('отвечает 405 на неподдерживаемый метод', async () => {
    const { app } = createStubbedApp();

    const response = await request(app).put('/api/download').send({ url: SHARE_URL });

    expect(response.status).toBe(405);
    expect(response.body).toEqual({ success: false, message: 'Method not allowed' });
  });
});

describe('Получение файла', () => {
  it('возвращает метаданные и прямую ссылку', async () => {
    const { app, calls } = createUpstreamApp();

    const response = await request(app).post('/api/download').send({ url: SHARE_URL });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      data: {
        filename: 'holiday.mp4',
        size: 1048576,
        fs_id: 42,
        download_url: 'https://example/direct',
        thumbnail: 'https://thumbs.example.test/3.jpg',
        category: 1,
        isdir: 0
      }
    });
    expect(calls.map((call) => call.url)).toEqual([UPSTREAM_PATHS.LIST, UPSTREAM_PATHS.DOWNLOAD]);
  });

  it('не отдаёт download_url в /api/info', async () => {
    const { app, calls } = createUpstreamApp();

    const response = await request(app).get('/api/info').query({ url: SHARE_URL });

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.data.filename).toBe('holiday.mp4');
    expect(Object.keys(response.body.data)).not.toContain('download_url');
    expect(calls.map((call) => call.url)).toEqual([UPSTREAM_PATHS.LIST]);
  });

  it('передаёт режим маршрута провайдеру', async () => {
    const { app, getFileInfo } = createStubbedApp();
    getFileInfo.mockResolvedValue({ success: false, message: 'No files found in the link' });

    const download = await request(app).get('/api/download').query({ url: SHARE_URL });
    const info = await request(app).post('/api/info').send({ url: SHARE_URL });

    expect(download.body).toEqual({ success: false, message: 'No files found in the link' });
    expect(info.body).toEqual({ success: false, message: 'No files found in the link' });
    expect(getFileInfo.mock.calls).toEqual([
      [SHARE_URL, { withDownloadUrl: true }],
      [SHARE_URL, { withDownloadUrl: false }]
    ]);
  });

  it('скрывает причину непредвиденной ошибки', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { app, getFileInfo } = createStubbedApp();
    getFileInfo.mockRejectedValue(new Error('database password leaked'));

    const response = await request(app).post('/api/download').send({ url: SHARE_URL });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ success: false, message: 'Internal server error' });
    expect(consoleError).toHaveBeenCalledTimes(1);
  });
});
