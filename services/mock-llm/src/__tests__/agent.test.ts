import { describe, it, expect } from '@jest/globals';
import type { Server } from 'http';
import request from 'supertest';
import { AnalysisMode } from '@inferlab/shared-types';
import { createApp } from '../app';
import { busyLoop } from '../routes/agent';

const body = { query: 'What are your hours?', user_id: 'user-1' };

function buildApp(random = 0.5) {
  const sleeps: number[] = [];
  const context = createApp({
    config: { latencyMinSeconds: 0.1, latencyMaxSeconds: 0.3 },
    random: () => random,
    sleep: async ms => {
      sleeps.push(ms);
    },
  });
  return { ...context, sleeps };
}

describe('agent routes', () => {
  describe('POST /api/v1/agent/chat', () => {
    it('answers after a delay from the latency window', async () => {
      const { app, sleeps } = buildApp(0.5);

      const response = await request(app).post('/api/v1/agent/chat').send(body);

      expect(response.status).toBe(200);
      expect(response.body.response_text).toBe('Simulated AI response to: What are your hours?');
      expect(response.body.processing_time).toBe('0.20s');
      expect(typeof response.body.server_memory_usage_mb).toBe('number');
      expect(sleeps).toEqual([200]);
    });

    it('fails with 503 when the error rate triggers', async () => {
      const { app, chaos } = buildApp(0);
      chaos.setErrorRate(1);

      const response = await request(app).post('/api/v1/agent/chat').send(body);

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ error: 'Service Unavailable - Overwhelmed', code: 'SERVICE_UNAVAILABLE' });
    });

    it('never fails at error rate 0', async () => {
      const { app } = buildApp(0);

      const response = await request(app).post('/api/v1/agent/chat').send(body);

      expect(response.status).toBe(200);
    });

    it('grows the leak by one block per call in leak mode', async () => {
      const { app, chaos } = buildApp();
      chaos.activateMemoryLeak();

      await request(app).post('/api/v1/agent/chat').send(body);
      await request(app).post('/api/v1/agent/chat').send(body);

      expect(chaos.snapshot().leaked_bytes).toBe(2 * 1024 * 1024);
    });

    it('rejects a body without a query', async () => {
      const { app } = buildApp();

      const response = await request(app).post('/api/v1/agent/chat').send({ user_id: 'user-1' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/v1/agent/analyze', () => {
    it('waits twice the minimum latency in I/O mode', async () => {
      const { app, sleeps } = buildApp();

      const response = await request(app).post('/api/v1/agent/analyze').send(body);

      expect(response.body).toEqual({ status: 'Analysis Complete', mode: AnalysisMode.IO_BOUND });
      expect(sleeps).toEqual([200]);
    });

    it('runs on the CPU when stress mode is active', async () => {
      const { app, chaos, sleeps } = buildApp();
      chaos.activateCpuStress();

      const response = await request(app).post('/api/v1/agent/analyze').send(body);

      expect(response.body).toEqual({ status: 'Heavy Analysis Complete', mode: AnalysisMode.CPU_BOUND });
      expect(sleeps).toEqual([]);
    });

    it('serializes concurrent requests under CPU stress', async () => {
      const { app, chaos } = createApp({ config: { latencyMinSeconds: 0.1, latencyMaxSeconds: 0.1 } });
      chaos.activateCpuStress();

      const server: Server = await new Promise(resolve => {
        const listening = app.listen(0, () => resolve(listening));
      });
      try {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          throw new Error('Server is not listening on a TCP port');
        }
        const target = `http://127.0.0.1:${address.port}`;

        const startedAt = Date.now();
        const responses = await Promise.all([
          request(target).post('/api/v1/agent/analyze').send(body),
          request(target).post('/api/v1/agent/analyze').send(body),
        ]);
        const elapsed = Date.now() - startedAt;

        expect(responses.map(response => response.body.mode)).toEqual([AnalysisMode.CPU_BOUND, AnalysisMode.CPU_BOUND]);
        expect(elapsed).toBeGreaterThanOrEqual(380);
      } finally {
        await new Promise<void>(resolve => server.close(() => resolve()));
      }
    });
  });

  describe('busyLoop', () => {
    it('runs until the clock passes the deadline', () => {
      let ticks = 0;
      const now = () => {
        ticks += 1;
        return ticks * 10;
      };

      busyLoop(50, now, () => 0.5);

      expect(now()).toBeGreaterThanOrEqual(60);
    });
  });
});

describe('service routes', () => {
  it('reports health with the live chaos snapshot', async () => {
    const { app, chaos } = buildApp();
    chaos.activateMemoryLeak();

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.config).toEqual({
      latency_min: 0.1,
      latency_max: 0.3,
      error_rate: 0,
      memory_leak_active: true,
      cpu_stress_active: false,
      leaked_bytes: 0,
    });
  });

  it('describes the service at the root', async () => {
    const { app } = buildApp();

    const response = await request(app).get('/');

    expect(response.body.service).toBe('Mock LLM Server');
    expect(response.body.config.min_latency).toBe(0.1);
  });

  it('returns 404 for unknown paths', async () => {
    const { app } = buildApp();

    const response = await request(app).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Not found' });
  });
});
