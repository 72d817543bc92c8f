/**
 * Update Poller - Telegram long-poll loop
 *
 * Fetches one batch of updates at a time and hands each to the handler in
 * order. The cursor advances past every update whether or not its handler
 * succeeded, so a poisonous update is never fetched twice. A failed batch
 * fetch is logged and retried after a pause; the loop ends only on stop().
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';

export interface PolledUpdate {
    update_id: number;
}

export interface UpdateSource<U extends PolledUpdate> {
    getUpdates(offset: number, timeoutSeconds: number): Promise<U[]>;
}

export type UpdateHandler<U extends PolledUpdate> = (update: U) => Promise<void>;

export interface UpdatePollerOptions {
    /** Long-poll timeout passed to getUpdates */
    pollTimeoutSeconds?: number;
    /** Pause after a failed fetch */
    errorBackoffMs?: number;
}

export interface UpdatePollerStatus {
    isRunning: boolean;
    lastUpdateId: number;
    processedUpdates: number;
    failedBatches: number;
}

export class UpdatePoller<U extends PolledUpdate> {
    private readonly pollTimeoutSeconds: number;
    private readonly errorBackoffMs: number;

    private isRunning = false;
    private lastUpdateId = 0;
    private processedUpdates = 0;
    private failedBatches = 0;
    private loop: Promise<void> | null = null;
    private wakeUp: (() => void) | null = null;

    constructor(
        private readonly source: UpdateSource<U>,
        private readonly handler: UpdateHandler<U>,
        options: UpdatePollerOptions = {}
    ) {
        this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 10;
        this.errorBackoffMs = options.errorBackoffMs ?? 5000;
    }

    /**
     * Starts the loop in the background. Calling start twice is a no-op.
     */
    start(): void {
        if (this.isRunning) {
            LogEngine.warn('Update poller is already running');
            return;
        }

        this.isRunning = true;
        LogEngine.info('Starting Telegram update polling', {
            pollTimeoutSeconds: this.pollTimeoutSeconds
        });
        this.loop = this.run();
    }

    /**
     * Stops the loop and waits for the current iteration to finish.
     * An in-flight getUpdates call still runs out its long-poll timeout.
     */
    async stop(): Promise<void> {
        this.isRunning = false;
        this.wakeUp?.();

        if (this.loop) {
            await this.loop;
            this.loop = null;
        }
        LogEngine.info('Telegram update polling stopped', { lastUpdateId: this.lastUpdateId });
    }

    getStatus(): UpdatePollerStatus {
        return {
            isRunning: this.isRunning,
            lastUpdateId: this.lastUpdateId,
            processedUpdates: this.processedUpdates,
            failedBatches: this.failedBatches
        };
    }

    private async run(): Promise<void> {
        while (this.isRunning) {
            try {
                await this.pollOnce();
            } catch (error) {
                this.failedBatches++;
                LogEngine.error('Error in polling loop', {
                    error: error instanceof Error ? error.message : String(error),
                    retryInMs: this.errorBackoffMs
                });
                await this.sleep(this.errorBackoffMs);
            }
        }
    }

    /**
     * Fetches and handles one batch.
     */
    async pollOnce(): Promise<number> {
        const updates = await this.source.getUpdates(this.lastUpdateId + 1, this.pollTimeoutSeconds);

        for (const update of updates) {
            try {
                await this.handler(update);
            } catch (error) {
                LogEngine.error('Error handling update', {
                    updateId: update.update_id,
                    error: error instanceof Error ? error.message : String(error)
                });
            }
            this.lastUpdateId = update.update_id;
            this.processedUpdates++;
        }

        return updates.length;
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.wakeUp = null;
                resolve();
            }, ms);
            this.wakeUp = () => {
                clearTimeout(timer);
                this.wakeUp = null;
                resolve();
            };
        });
    }
}
