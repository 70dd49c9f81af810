import logger from "./logger.js";

type QueueTask = (callback: (err: unknown, result?: unknown) => void) => void;

/**
 * Runs tasks one at a time in submission order. Every state-changing
 * transaction goes through here, so each one completes before the next starts.
 */
export class ProcessingQueue {
    queue: QueueTask[];
    processing: boolean;

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

    /**
     * Queues an async task and settles with its outcome.
     */
    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.push((callback) => {
                task().then(
                    (result) => {
                        resolve(result);
                        callback(null, result);
                    },
                    (err: unknown) => {
                        reject(err);
                        callback(err);
                    }
                );
            });
        });
    }

    get pending(): number {
        return this.queue.length;
    }

    private execute(): void {
        const first = this.queue.shift();
        if (first) {
            first((err: unknown) => {
                if (err) {
                    logger.debug(`ProcessingQueue task failed: ${err instanceof Error ? err.message : String(err)}`);
                }
                if (this.queue.length > 0) {
                    this.execute();
                } else {
                    this.processing = false;
                }
            });
        } else {
            this.processing = false;
        }
    }
}

export default ProcessingQueue;
