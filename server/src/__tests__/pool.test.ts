import { describe, it, expect, vi } from 'vitest';
import { runPool } from '../pool';

describe('runPool', () => {
    it('should keep task order whatever the worker count', async () => {
        const tasks = [3, 1, 4, 1, 5].map(n => () => n * 2);

        expect(await runPool(tasks, 1)).toEqual([6, 2, 8, 2, 10]);
        expect(await runPool(tasks, 3)).toEqual([6, 2, 8, 2, 10]);
        expect(await runPool(tasks, 10)).toEqual([6, 2, 8, 2, 10]);
    });

    it('should run every task once', async () => {
        const task = vi.fn(() => 1);
        await runPool([task, task, task, task], 2);
        expect(task).toHaveBeenCalledTimes(4);
    });

    it('should resolve to nothing for no tasks', async () => {
        expect(await runPool([], 4)).toEqual([]);
    });

    it('should not start any task once aborted', async () => {
        const controller = new AbortController();
        controller.abort(new Error('stopped'));
        const task = vi.fn(() => 1);

        await expect(runPool([task], 1, controller.signal)).rejects.toThrow('stopped');
        expect(task).not.toHaveBeenCalled();
    });

    it('should stop between tasks when aborted mid-run', async () => {
        const controller = new AbortController();
        const ran: number[] = [];
        const tasks = [0, 1, 2, 3].map(i => () => {
            ran.push(i);
            if (i === 1) controller.abort(new Error('stopped'));
            return i;
        });

        await expect(runPool(tasks, 1, controller.signal)).rejects.toThrow('stopped');
        expect(ran).toEqual([0, 1]);
    });

    it('should propagate a task error', async () => {
        const tasks = [() => 1, () => {
            throw new Error('boom');
        }];
        await expect(runPool(tasks, 2)).rejects.toThrow('boom');
    });
});
