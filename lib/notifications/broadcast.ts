/**
 * Alert Broadcaster
 * Fans an alert out to every subscriber in paced batches
 */

import { loggers, toError } from '@/lib/logging/logger';
import type { DeliveryStore, SubscriberStore } from '@/lib/reports/types';

export interface MessageSender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

export interface BroadcastConfig {
  batchSize: number;
  pauseMs: number;
}

export interface BroadcastResult {
  sent: number;
  failed: number;
}

export const DEFAULT_BROADCAST_CONFIG: BroadcastConfig = {
  batchSize: 25,
  pauseMs: 300,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  const step = Math.max(1, size);
  for (let i = 0; i < items.length; i += step) {
    batches.push(items.slice(i, i + step));
  }
  return batches;
}

export class Broadcaster {
  private readonly log = loggers.broadcast;

  constructor(
    private readonly sender: MessageSender,
    private readonly store: SubscriberStore & DeliveryStore,
    private readonly config: BroadcastConfig = DEFAULT_BROADCAST_CONFIG,
    private readonly pause: (ms: number) => Promise<void> = sleep
  ) {}

  async broadcast(reportId: string, text: string): Promise<BroadcastResult> {
    const subscribers = await this.store.listSubscribers();
    const batches = chunk(subscribers, this.config.batchSize);
    const result: BroadcastResult = { sent: 0, failed: 0 };

    for (const [index, batch] of batches.entries()) {
      const settled = await Promise.allSettled(
        batch.map(async (chatId) => {
          await this.sender.sendMessage(chatId, text);
          try {
            await this.store.recordDelivery(reportId, chatId, new Date());
          } catch (error) {
            // The message went out; only the bookkeeping is lost
            this.log.error('Failed to record delivery', toError(error), { reportId, chatId });
          }
        })
      );

      settled.forEach((outcome, position) => {
        if (outcome.status === 'fulfilled') {
          result.sent++;
          return;
        }
        result.failed++;
        this.log.warn('Alert delivery failed', {
          reportId,
          chatId: batch[position],
          error: toError(outcome.reason).message,
        });
      });

      if (index < batches.length - 1 && this.config.pauseMs > 0) {
        await this.pause(this.config.pauseMs);
      }
    }

    this.log.info('Broadcast finished', {
      reportId,
      subscribers: subscribers.length,
      batches: batches.length,
      ...result,
    });

    return result;
  }
}
