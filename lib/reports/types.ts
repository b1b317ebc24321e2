/**
 * Persistence contracts used by the submission flow
 */

import type { Verdict } from '@/lib/threat-intel/types';

export interface NewReport {
  submitterId: string;
  url: string;
  domain: string;
  verdict: Verdict;
  source: string;
  evidence: Readonly<Record<string, unknown>>;
  createdAt: Date;
}

/**
 * A stored report. Evidence comes back as the stored (possibly truncated)
 * JSON text.
 */
export interface Report extends Omit<NewReport, 'evidence'> {
  id: string;
  evidence: string;
}

export interface ReportStore {
  saveReport(report: NewReport): Promise<string>;
  listRecent(limit: number): Promise<Report[]>;
  countReports(): Promise<number>;
}

export interface SubscriberStore {
  /** Returns false when the chat was already subscribed */
  addSubscriber(chatId: string, isAdmin: boolean): Promise<boolean>;
  /** Returns false when the chat was not subscribed */
  removeSubscriber(chatId: string): Promise<boolean>;
  listSubscribers(): Promise<string[]>;
  countSubscribers(): Promise<number>;
}

export interface AlertRecordStore {
  hasAlertSince(url: string, since: Date): Promise<boolean>;
  appendAlert(url: string, alertedAt: Date): Promise<void>;
}

export interface DeliveryStore {
  recordDelivery(reportId: string, recipientId: string, deliveredAt: Date): Promise<void>;
}

export type LinkwatchStore = ReportStore & SubscriberStore & AlertRecordStore & DeliveryStore;

// Long provider payloads are cut, not rejected
export const MAX_EVIDENCE_LENGTH = 4000;

export function serializeEvidence(evidence: Readonly<Record<string, unknown>>): string {
  return JSON.stringify(evidence).slice(0, MAX_EVIDENCE_LENGTH);
}
