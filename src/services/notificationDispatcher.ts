/**
 * GitHub Telegram Relay - Notification Dispatcher
 *
 * Fans a formatted notification out to every target chat without holding up
 * the webhook request that produced it. Each delivery runs as a detached task
 * that is tracked until it settles, so shutdown can wait for it.
 *
 * Delivery Semantics:
 * - one send attempt per target, no retries
 * - a failure for one chat is logged and the remaining chats still get the message
 * - an empty target list schedules nothing
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';

/**
 * Sends one message to one chat.
 *
 * Resolves `false` when the send was refused in a way the sender already
 * handled (blocked bot, Telegram throttling); rejects on any other failure.
 */
export interface MessageSender {
    sendMessage(chatId: number, text: string): Promise<boolean>;
}

export interface DeliveryReport {
    delivered: number;
    skipped: number;
    failed: number;
}

export class NotificationDispatcher {
    private readonly pending = new Set<Promise<DeliveryReport | void>>();

    constructor(private readonly sender: MessageSender) {}

    /**
     * Schedules delivery and returns immediately.
     */
    dispatch(message: string, targets: readonly number[]): void {
        if (targets.length === 0) {
            LogEngine.debug('No notification targets configured - skipping delivery');
            return;
        }

        const chatIds = [...targets];
        const task: Promise<DeliveryReport | void> = this.deliver(message, chatIds)
            .catch((error: unknown) => {
                LogEngine.error('Notification delivery task failed', {
                    error: error instanceof Error ? error.message : String(error)
                });
            })
            .finally(() => {
                this.pending.delete(task);
            });

        this.pending.add(task);
    }

    /**
     * Sends the message to each chat in turn.
     */
    async deliver(message: string, chatIds: readonly number[]): Promise<DeliveryReport> {
        const report: DeliveryReport = { delivered: 0, skipped: 0, failed: 0 };

        for (const chatId of chatIds) {
            try {
                const sent = await this.sender.sendMessage(chatId, message);
                if (sent) {
                    report.delivered++;
                } else {
                    report.skipped++;
                }
            } catch (error) {
                report.failed++;
                LogEngine.error('Failed to send notification', {
                    chatId,
                    error: error instanceof Error ? error.message : String(error)
                });
            }
        }

        LogEngine.info('Notification delivered', { targets: chatIds.length, ...report });
        return report;
    }

    /**
     * Number of delivery tasks still in flight
     */
    get pendingCount(): number {
        return this.pending.size;
    }

    /**
     * Waits until every scheduled delivery has settled.
     */
    async drain(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.allSettled([...this.pending]);
        }
    }
}
