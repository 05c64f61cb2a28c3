import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../src/app.js';
import type { ArchiveService } from '../src/services/archive/index.js';

vi.mock('../src/utils/logger.js', () => ({
  default: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('App', () => {
  const archiveService: ArchiveService = {
    listGuilds: vi.fn(),
    listChannels: vi.fn(),
    startRun: vi.fn(),
    getRun: vi.fn(),
  };
  const app = createApp({ archiveService });

  describe('GET /health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'ok');
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('GET /api', () => {
    it('should return the service banner', async () => {
      const response = await request(app).get('/api');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        message: 'Discord Archiver API',
        version: '1.0.0',
      });
    });
  });

  describe('POST /api/archives', () => {
    it('should reject a malformed JSON body', async () => {
      const response = await request(app)
        .post('/api/archives')
        .set('X-API-KEY', 'test-api-key-12345')
        .set('Content-Type', 'application/json')
        .send('{"guildId": ');

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: 'Bad Request',
        message: 'Malformed JSON body',
      });
    });
  });
});
