import logger from './logger.js';

export type QueueTask = (callback: (err: Error | null) => void) => void;

/** Runs pushed tasks one at a time, in push order. A failing task is logged and the queue moves on. */
export class ProcessingQueue {
    queue: QueueTask[];
    processing: boolean;
    private idleWaiters: Array<() => void> = [];

    constructor() {
        this.queue = [];
        this.processing = false;
    }

    push(f: QueueTask = (cb) => cb(null)): void {
        this.queue.push(f);
        if (!this.processing) {
            this.processing = true;
            this.execute();
        }
    }

    /** Resolves once every task pushed so far has run. */
    drain(): Promise<void> {
        if (!this.processing) return Promise.resolve();
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    private execute(): void {
        const first = this.queue.shift();
        if (first) {
            first((err) => {
                if (err) {
                    logger.error(`Error in ProcessingQueue task: ${err.message}`);
                }
                if (this.queue.length > 0) {
                    this.execute();
                } else {
                    this.idle();
                }
            });
        } else {
            this.idle();
        }
    }

    private idle(): void {
        this.processing = false;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }
}

export default ProcessingQueue;
