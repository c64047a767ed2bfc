import { jobKind } from '../../src/db/engine_job.entity';
import type { EngineJobEntity } from '../../src/db/engine_job.entity';
import { Poller } from '../../src/services/poller';
import { InMemoryJobQueue } from '../helpers/memory';
import { waitUntil } from '../helpers/poll';

describe('Poller', () => {
    let queue: InMemoryJobQueue;
    let received: EngineJobEntity[];
    let poller: Poller;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        queue = new InMemoryJobQueue();
        received = [];
        poller = new Poller(queue, {
            workerId: 'worker-a',
            batchSize: 2,
            onJobReceived: async (job) => {
                received.push(job);
            },
        });
    });

    afterEach(async () => {
        await poller.stop();
        jest.restoreAllMocks();
    });

    it('hands dequeued jobs to the callback, one batch at a time', async () => {
        await queue.enqueue(jobKind.RUN_WORKFLOW, 'wf_1');
        await queue.enqueue(jobKind.RUN_WORKFLOW, 'wf_2');
        await queue.enqueue(jobKind.RUN_WORKFLOW, 'wf_3');

        expect(await poller.pollOnce()).toBe(2);
        expect(received.map((j) => j.workflow_id)).toEqual(['wf_1', 'wf_2']);
        expect(received[0]?.worker_id).toBe('worker-a');
        expect(received[0]?.attempt).toBe(1);

        expect(await poller.pollOnce()).toBe(1);
        expect(await poller.pollOnce()).toBe(0);
    });

    it('backs off while idle and snaps back when work arrives', async () => {
        const intervals: number[] = [];
        for (let i = 0; i < 4; i++) {
            await poller.pollOnce();
            intervals.push(poller.currentInterval);
        }
        expect(intervals).toEqual([200, 400, 500, 500]);

        await queue.enqueue(jobKind.SEND_REMINDER, 'wf_1');
        await poller.pollOnce();
        expect(poller.currentInterval).toBe(100);
    });

    it('skips the poll under backpressure', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const dequeue = jest.spyOn(queue, 'dequeue');
        poller = new Poller(queue, {
            workerId: 'worker-a',
            onJobReceived: async () => undefined,
            checkBackpressure: () => true,
        });

        expect(await poller.pollOnce()).toBe(-1);
        expect(dequeue).not.toHaveBeenCalled();
    });

    it('survives dequeue errors', async () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.spyOn(queue, 'dequeue').mockRejectedValueOnce(new Error('connection reset'));

        expect(await poller.pollOnce()).toBe(0);
        expect(poller.currentInterval).toBe(500);
    });

    it('logs callback failures without stopping', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const failure = new Error('handler blew up');
        poller = new Poller(queue, {
            workerId: 'worker-a',
            onJobReceived: async () => {
                throw failure;
            },
        });
        const job = await queue.enqueue(jobKind.RUN_WORKFLOW, 'wf_1');

        expect(await poller.pollOnce()).toBe(1);
        await waitUntil(() => error.mock.calls.length > 0, 1000, 10);
        expect(error).toHaveBeenCalledWith(`[poller] job ${job.id} callback error:`, failure);
    });

    it('keeps polling once started', async () => {
        poller.start();
        await queue.enqueue(jobKind.RUN_WORKFLOW, 'wf_1');

        await waitUntil(() => received.length === 1, 2000, 20);
        await poller.stop();
        expect(received[0]?.workflow_id).toBe('wf_1');
    });
});
