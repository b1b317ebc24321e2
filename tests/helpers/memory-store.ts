/**
 * In-memory stand-in for the Postgres store
 */

import {
  serializeEvidence,
  type LinkwatchStore,
  type NewReport,
  type Report,
} from '@/lib/reports/types';

export interface Delivery {
  reportId: string;
  recipientId: string;
  deliveredAt: Date;
}

export class MemoryStore implements LinkwatchStore {
  readonly reports: Report[] = [];
  readonly subscribers = new Map<string, { joinedAt: Date; isAdmin: boolean }>();
  readonly alerts: Array<{ url: string; alertedAt: Date }> = [];
  readonly deliveries: Delivery[] = [];
  private nextId = 1;

  async saveReport(report: NewReport): Promise<string> {
    const id = String(this.nextId++);
    this.reports.push({ ...report, id, evidence: serializeEvidence(report.evidence) });
    return id;
  }

  async listRecent(limit: number): Promise<Report[]> {
    return [...this.reports].reverse().slice(0, limit);
  }

  async countReports(): Promise<number> {
    return this.reports.length;
  }

  async addSubscriber(chatId: string, isAdmin: boolean): Promise<boolean> {
    if (this.subscribers.has(chatId)) return false;
    this.subscribers.set(chatId, { joinedAt: new Date(), isAdmin });
    return true;
  }

  async removeSubscriber(chatId: string): Promise<boolean> {
    return this.subscribers.delete(chatId);
  }

  async listSubscribers(): Promise<string[]> {
    return [...this.subscribers.keys()];
  }

  async countSubscribers(): Promise<number> {
    return this.subscribers.size;
  }

  async hasAlertSince(url: string, since: Date): Promise<boolean> {
    return this.alerts.some((alert) => alert.url === url && alert.alertedAt.getTime() >= since.getTime());
  }

  async appendAlert(url: string, alertedAt: Date): Promise<void> {
    this.alerts.push({ url, alertedAt });
  }

  async recordDelivery(reportId: string, recipientId: string, deliveredAt: Date): Promise<void> {
    this.deliveries.push({ reportId, recipientId, deliveredAt });
  }
}
