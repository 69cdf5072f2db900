import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildApp } from './app.js';
import type { FastifyInstance } from 'fastify';

describe('App', () => {
  let app: FastifyInstance;
  let tempDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    originalEnv = { ...process.env };

    // Create temp directory for database
    tempDir = mkdtempSync(join(tmpdir(), 'crewplan-test-'));
    process.env.DATABASE_URL = join(tempDir, 'test.db');
    process.env.LOG_LEVEL = 'fatal';

    app = await buildApp();
  });

  afterEach(async () => {
    await app.close();
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('Health endpoints', () => {
    it('GET /api/health reports liveness', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toHaveProperty('status', 'ok');
    });

    it('GET /api/health/ready checks the database', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toHaveProperty('status', 'ready');
    });
  });

  describe('Compression Plugin', () => {
    it('compresses large responses with gzip', async () => {
      for (let i = 0; i < 40; i++) {
        await app.inject({
          method: 'POST',
          url: '/api/employees',
          payload: { name: `Employee number ${i}`, position: 'carpenter' },
        });
      }

      const response = await app.inject({
        method: 'GET',
        url: '/api/employees',
        headers: {
          'accept-encoding': 'gzip',
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-encoding']).toBe('gzip');
    });

    it('handles requests with deflate encoding', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/health',
        headers: {
          'accept-encoding': 'deflate',
        },
      });

      expect(response.statusCode).toBe(200);
    });

    it('handles requests without compression support', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/health',
        headers: {
          'accept-encoding': 'identity',
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toHaveProperty('status', 'ok');
    });
  });
});
