import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createApp } from '../../app';
import { createHarness, Harness } from '../../__tests__/fixtures';

describe('HTTP routes', () => {
    let h: Harness;
    let app: ReturnType<typeof createApp>;

    const add = (specializationKey: string, body: object) =>
        request(app).post(`/queues/${specializationKey}/entries`).send(body);

    beforeEach(() => {
        h = createHarness();
        app = createApp({ queueManager: h.manager });
    });

    describe('POST /queues/:specializationKey/entries', () => {
        it('adds a patient and reports position and estimate', async () => {
            const res = await add('cardiology', { patientRef: 'P-1' });

            expect(res.status).toBe(201);
            expect(res.body.entry).toMatchObject({
                patientRef: 'P-1',
                specializationKey: 'cardiology',
                priority: 'NORMAL',
                state: 'WAITING',
                joinedAt: '2026-03-02T09:00:00.000Z',
                servedAt: null
            });
            expect(res.body.position).toBe(1);
            expect(res.body.estimatedWaitMs).toBe(900_000);
        });

        it('answers 400 for an unknown priority', async () => {
            const res = await add('cardiology', { patientRef: 'P-1', priority: 'CRITICAL' });

            expect(res.status).toBe(400);
            expect(res.body.error.code).toBe('VALIDATION_ERROR');
        });

        it('answers 400 without a patientRef', async () => {
            const res = await add('cardiology', { patientRef: '   ' });

            expect(res.status).toBe(400);
            expect(res.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'patientRef: patientRef is required' });
        });

        it('answers 400 for an unknown specialization', async () => {
            const res = await add('oncology', { patientRef: 'P-1' });

            expect(res.status).toBe(400);
            expect(res.body.error.message).toBe('Specialization oncology not found');
        });

        it('answers 409 for an inactive specialization', async () => {
            const res = await add('radiology', { patientRef: 'P-1' });

            expect(res.status).toBe(409);
            expect(res.body.error.code).toBe('INACTIVE_SPECIALIZATION');
        });

        it('answers 409 at capacity', async () => {
            await add('cardiology', { patientRef: 'P-1' });
            await add('cardiology', { patientRef: 'P-2', priority: 'URGENT' });

            const res = await add('cardiology', { patientRef: 'P-3' });

            expect(res.status).toBe(409);
            expect(res.body.error).toEqual({
                code: 'CAPACITY_EXCEEDED',
                message: 'Queue for cardiology is at maximum capacity (2)'
            });
        });

        it('answers 409 for a patient already waiting', async () => {
            await add('neurology', { patientRef: 'P-1' });

            const res = await add('neurology', { patientRef: 'P-1' });

            expect(res.status).toBe(409);
            expect(res.body.error.code).toBe('DUPLICATE_ENTRY');
        });

        it('answers 503 when the write fails', async () => {
            h.store.failNextSave();

            const res = await add('neurology', { patientRef: 'P-1' });

            expect(res.status).toBe(503);
            expect(res.body.error).toEqual({
                code: 'PERSISTENCE_ERROR',
                message: 'Persistence save failed: disk full'
            });
            expect((await request(app).get('/queues/neurology')).body.queueLength).toBe(0);
        });

        it('answers 400 for malformed JSON', async () => {
            const res = await request(app)
                .post('/queues/cardiology/entries')
                .set('Content-Type', 'application/json')
                .send('{"patientRef":');

            expect(res.status).toBe(400);
            expect(res.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
        });
    });

    describe('queue reads', () => {
        it('GET /queues/:specializationKey lists entries in serve order', async () => {
            await add('neurology', { patientRef: 'P-1' });
            h.time.advanceMinutes(1);
            await add('neurology', { patientRef: 'P-2', priority: 'SUPER_URGENT' });

            const res = await request(app).get('/queues/neurology');

            expect(res.status).toBe(200);
            expect(res.body.specializationKey).toBe('neurology');
            expect(res.body.queueLength).toBe(2);
            expect(res.body.queue.map((item: { entry: { patientRef: string } }) => item.entry.patientRef))
                .toEqual(['P-2', 'P-1']);
            expect(res.body.queue[1].position).toBe(2);
            expect(res.body.queue[1].estimatedWaitMs).toBe(1_800_000);
        });

        it('GET /queues returns every queue held in memory', async () => {
            await add('neurology', { patientRef: 'P-1' });
            await add('cardiology', { patientRef: 'P-2' });

            const res = await request(app).get('/queues');

            expect(Object.keys(res.body.queues)).toEqual(['cardiology', 'neurology']);
            expect(res.body.queues.cardiology[0].entry.patientRef).toBe('P-2');
        });

        it('GET /queues/:specializationKey/statistics', async () => {
            await add('cardiology', { patientRef: 'P-1', priority: 'URGENT' });

            const res = await request(app).get('/queues/cardiology/statistics');

            expect(res.status).toBe(200);
            expect(res.body.statistics).toMatchObject({
                specializationKey: 'cardiology',
                currentLength: 1,
                capacity: 2,
                capacityUtilization: 0.5,
                servedCount: 0,
                countByPriority: { NORMAL: 0, URGENT: 1, SUPER_URGENT: 0 }
            });
        });

        it('GET /entries/:id returns position and queue length', async () => {
            await add('neurology', { patientRef: 'P-1', priority: 'URGENT' });
            const created = await add('neurology', { patientRef: 'P-2' });

            const res = await request(app).get(`/entries/${created.body.entry.id}`);

            expect(res.status).toBe(200);
            expect(res.body.position).toBe(2);
            expect(res.body.queueLength).toBe(2);
            expect(res.body.entry.patientRef).toBe('P-2');
        });

        it('GET /entries/:id answers 404 for an unknown entry', async () => {
            const res = await request(app).get('/entries/does-not-exist');

            expect(res.status).toBe(404);
            expect(res.body.error).toEqual({
                code: 'ENTRY_NOT_FOUND',
                message: 'No waiting queue entry with id does-not-exist'
            });
        });
    });

    describe('serving and changes', () => {
        it('POST /queues/:specializationKey/serve-next serves the highest priority', async () => {
            await add('cardiology', { patientRef: 'P-1' });
            h.time.advanceMinutes(1);
            await add('cardiology', { patientRef: 'P-2', priority: 'URGENT' });

            const res = await request(app).post('/queues/cardiology/serve-next');

            expect(res.status).toBe(200);
            expect(res.body.message).toBe('Patient served');
            expect(res.body.entry).toMatchObject({ patientRef: 'P-2', state: 'SERVED' });
        });

        it('serve-next answers 404 on an empty queue', async () => {
            const res = await request(app).post('/queues/neurology/serve-next');

            expect(res.status).toBe(404);
            expect(res.body.error.code).toBe('EMPTY_QUEUE');
        });

        it('POST /entries/:id/serve serves out of order', async () => {
            await add('neurology', { patientRef: 'P-1', priority: 'URGENT' });
            const created = await add('neurology', { patientRef: 'P-2' });

            const res = await request(app).post(`/entries/${created.body.entry.id}/serve`);

            expect(res.status).toBe(200);
            expect(res.body.entry.state).toBe('SERVED');
            expect((await request(app).get('/queues/neurology')).body.queueLength).toBe(1);
        });

        it('POST /entries/:id/remove records the reason, then 404s', async () => {
            const created = await add('neurology', { patientRef: 'P-1' });
            const id: string = created.body.entry.id;

            const res = await request(app).post(`/entries/${id}/remove`).send({ reason: 'left without being seen' });

            expect(res.status).toBe(200);
            expect(res.body.entry).toMatchObject({ state: 'REMOVED', removalReason: 'left without being seen' });

            const again = await request(app).post(`/entries/${id}/remove`).send({});
            expect(again.status).toBe(404);
        });

        it('POST /entries/:id/remove without a body stores no reason', async () => {
            const created = await add('neurology', { patientRef: 'P-1' });

            const res = await request(app).post(`/entries/${created.body.entry.id}/remove`);

            expect(res.status).toBe(200);
            expect(res.body.entry.removalReason).toBeNull();
        });

        it('PATCH /entries/:id/priority reorders the queue', async () => {
            await add('neurology', { patientRef: 'P-1' });
            h.time.advanceMinutes(1);
            const created = await add('neurology', { patientRef: 'P-2' });

            const res = await request(app)
                .patch(`/entries/${created.body.entry.id}/priority`)
                .send({ priority: 'SUPER_URGENT' });

            expect(res.status).toBe(200);
            expect(res.body.message).toBe('Priority changed to SUPER_URGENT');
            expect(res.body.entry.joinedAt).toBe('2026-03-02T09:01:00.000Z');
            expect((await request(app).get('/queues/neurology')).body.queue[0].entry.patientRef).toBe('P-2');
        });

        it('PATCH /entries/:id/priority answers 400 for an unknown priority', async () => {
            const created = await add('neurology', { patientRef: 'P-1' });

            const res = await request(app)
                .patch(`/entries/${created.body.entry.id}/priority`)
                .send({ priority: 'LOW' });

            expect(res.status).toBe(400);
        });

        it('answers 503 and keeps the patient waiting when a serve cannot be stored', async () => {
            await add('cardiology', { patientRef: 'P-1' });
            h.store.failNextUpdate();

            const res = await request(app).post('/queues/cardiology/serve-next');

            expect(res.status).toBe(503);
            expect(res.body.error.message).toBe('Persistence updateState failed: connection reset');
            expect((await request(app).get('/queues/cardiology')).body.queueLength).toBe(1);
        });
    });

    describe('service routes', () => {
        it('GET /health reports the number of queues', async () => {
            await add('cardiology', { patientRef: 'P-1' });

            const res = await request(app).get('/health');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({ status: 'healthy', queues: 1 });
        });

        it('answers 404 for an unknown route', async () => {
            const res = await request(app).get('/doctors');

            expect(res.status).toBe(404);
            expect(res.body.error.code).toBe('NOT_FOUND');
        });

        it('answers 500 without internals for an unexpected error', async () => {
            h.directory.getCapacityAndStatus = async () => {
                throw new Error('directory offline');
            };

            const res = await request(app).get('/queues/cardiology/statistics');

            expect(res.status).toBe(500);
            expect(res.body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
        });
    });
});
