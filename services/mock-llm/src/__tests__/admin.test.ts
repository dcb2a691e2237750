import { describe, it, expect } from '@jest/globals';
import request from 'supertest';
import { ChaosStatus } from '@inferlab/shared-types';
import { createApp } from '../app';

describe('chaos admin routes', () => {
  it('activates each scenario and reports its status', async () => {
    const { app, chaos } = createApp({ sleep: async () => undefined });

    const spike = await request(app).post('/admin/chaos/latency_spike');
    const leak = await request(app).post('/admin/chaos/memory_leak');
    const cpu = await request(app).post('/admin/chaos/cpu_spike');

    expect(spike.body).toEqual({ status: ChaosStatus.LATENCY_SPIKE });
    expect(leak.body).toEqual({ status: ChaosStatus.MEMORY_LEAK });
    expect(cpu.body).toEqual({ status: ChaosStatus.CPU_STRESS });
    expect(chaos.snapshot()).toMatchObject({
      latency_min: 3.0,
      latency_max: 8.0,
      memory_leak_active: true,
      cpu_stress_active: true,
    });
  });

  it('sets the error rate', async () => {
    const { app, chaos } = createApp();

    const response = await request(app).post('/admin/chaos/error_rate').send({ rate: 0.25 });

    expect(response.body).toEqual({ status: ChaosStatus.ERROR_RATE });
    expect(chaos.snapshot().error_rate).toBe(0.25);
  });

  it('rejects an error rate above 1', async () => {
    const { app, chaos } = createApp();

    const response = await request(app).post('/admin/chaos/error_rate').send({ rate: 2 });

    expect(response.status).toBe(400);
    expect(chaos.snapshot().error_rate).toBe(0);
  });

  it('restores the baseline on reset', async () => {
    const { app, chaos } = createApp();
    chaos.activateLatencySpike();
    chaos.activateMemoryLeak();
    chaos.activateCpuStress();
    chaos.setErrorRate(0.5);

    const response = await request(app).post('/admin/reset');

    expect(response.body).toEqual({ status: ChaosStatus.NORMALIZED });
    expect(chaos.snapshot()).toEqual({
      latency_min: 0.5,
      latency_max: 2.0,
      error_rate: 0,
      memory_leak_active: false,
      cpu_stress_active: false,
      leaked_bytes: 0,
    });
  });

  describe('with an admin token', () => {
    const buildApp = () => createApp({ config: { adminToken: 'test-secret' } });

    it('rejects requests without a bearer token', async () => {
      const { app, chaos } = buildApp();

      const response = await request(app).post('/admin/chaos/latency_spike');

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('AUTHENTICATION_ERROR');
      expect(chaos.snapshot().latency_min).toBe(0.5);
    });

    it('rejects a wrong token', async () => {
      const { app } = buildApp();

      const response = await request(app).post('/admin/reset').set('Authorization', 'Bearer wrong');

      expect(response.status).toBe(401);
      expect(response.body.error).toBe('Invalid admin token');
    });

    it('accepts the configured token', async () => {
      const { app } = buildApp();

      const response = await request(app).post('/admin/reset').set('Authorization', 'Bearer test-secret');

      expect(response.status).toBe(200);
    });
  });
});
