/**
 * Machine Endpoint Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createTestContext, type TestContext } from './helpers.js';

describe('Machine Endpoints', () => {
  let ctx: TestContext;
  let app: Express;

  beforeEach(async () => {
    ctx = createTestContext();
    app = ctx.app;
    await request(app).post('/room/').send({ name: 'Room 1' });
  });

  afterEach(() => {
    ctx.database.close();
  });

  describe('POST /machine/', () => {
    it('creates a machine in an existing room', async () => {
      const res = await request(app)
        .post('/machine/')
        .send({ room_id: 1, machine_id: 'A', machine_type: 'Dryer' });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ room_id: 1, machine_id: 'A', machine_type: 'dryer' });

      const fetched = await request(app).get('/machine/1/A');
      expect(fetched.status).toBe(200);
      expect(fetched.body).toEqual({ room_id: 1, machine_id: 'A', machine_type: 'dryer' });
    });

    it('returns 400 when the room does not exist', async () => {
      const res = await request(app)
        .post('/machine/')
        .send({ room_id: 7, machine_id: 'A', machine_type: 'washer' });

      expect(res.status).toBe(400);
      expect(res.body).toBe('The room id 7 was not found.');
    });

    it('returns 409 for a machine id already used in the room', async () => {
      await request(app).post('/machine/').send({ room_id: 1, machine_id: 'A', machine_type: 'washer' });

      const res = await request(app)
        .post('/machine/')
        .send({ room_id: 1, machine_id: 'A', machine_type: 'dryer' });

      expect(res.status).toBe(409);
      expect(res.body).toBe('Machine id A already exists in room id 1.');

      const fetched = await request(app).get('/machine/1/A');
      expect(fetched.body.machine_type).toBe('washer');
    });

    it('allows the same machine id in another room', async () => {
      await request(app).post('/room/').send({ name: 'Room 2' });
      await request(app).post('/machine/').send({ room_id: 1, machine_id: 'A', machine_type: 'washer' });

      const res = await request(app)
        .post('/machine/')
        .send({ room_id: 2, machine_id: 'A', machine_type: 'washer' });

      expect(res.status).toBe(201);
    });

    it('returns 400 for an unknown machine type', async () => {
      const res = await request(app)
        .post('/machine/')
        .send({ room_id: 1, machine_id: 'A', machine_type: 'mangle' });

      expect(res.status).toBe(400);
      expect(res.body).toContain('machine_type');
    });
  });

  describe('GET /machine/', () => {
    it('lists all machines', async () => {
      await request(app).post('/machine/').send({ room_id: 1, machine_id: 'A', machine_type: 'washer' });
      await request(app).post('/machine/').send({ room_id: 1, machine_id: 'B', machine_type: 'dryer' });

      const res = await request(app).get('/machine/');

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(2);
    });
  });

  describe('GET /machine/:roomId/:machineId', () => {
    it('returns 404 for an unknown machine', async () => {
      const res = await request(app).get('/machine/1/Z');

      expect(res.status).toBe(404);
      expect(res.body).toBe('Machine id Z was not found in room id 1.');
    });

    it('returns 404 for a negative room id', async () => {
      const res = await request(app).get('/machine/-1/A');

      expect(res.status).toBe(404);
      expect(res.body).toBe('Machine id A was not found in room id -1.');
    });
  });

  describe('DELETE /machine/:roomId/:machineId', () => {
    it('deletes once, then 404s', async () => {
      await request(app).post('/machine/').send({ room_id: 1, machine_id: 'A', machine_type: 'washer' });

      const first = await request(app).delete('/machine/1/A');
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ room_id: 1, machine_id: 'A', machine_type: 'washer' });

      const second = await request(app).delete('/machine/1/A');
      expect(second.status).toBe(404);
      expect(second.body).toBe('Machine id A was not found in room id 1.');
    });
  });

  describe('Machine report listings', () => {
    beforeEach(async () => {
      await request(app).post('/machine/').send({ room_id: 1, machine_id: 'A', machine_type: 'washer' });
      await request(app).post('/machine/').send({ room_id: 1, machine_id: 'B', machine_type: 'washer' });
      await request(app).post('/user/').send({ username: 'bob', admin: false });
      await request(app).post('/report/').send({
        room_id: 1, machine_id: 'A', reporter_username: 'bob', report_type: 'operational',
      });
      await request(app).post('/report/').send({
        room_id: 1, machine_id: 'A', reporter_username: 'bob', report_type: 'broken',
      });
      await request(app).post('/report/').send({
        room_id: 1, machine_id: 'B', reporter_username: 'bob', report_type: 'broken',
      });
      await request(app).post('/report/archive').send({ report_id: 1 });
    });

    it('lists unarchived reports for the machine', async () => {
      const res = await request(app).get('/machine/1/A/reports');

      expect(res.status).toBe(200);
      expect(res.body.map((r: { report_id: number }) => r.report_id)).toEqual([2]);
    });

    it('lists archived reports for the machine', async () => {
      const res = await request(app).get('/machine/1/A/reports/archived');

      expect(res.status).toBe(200);
      expect(res.body.map((r: { report_id: number }) => r.report_id)).toEqual([1]);
    });

    it('returns 404 for an unknown machine', async () => {
      const res = await request(app).get('/machine/1/Q/reports');

      expect(res.status).toBe(404);
      expect(res.body).toBe('Machine id Q was not found in room id 1.');
    });
  });
});
