/**
 * Postgres storage for subscribers, reports and alerts
 */

import { z } from 'zod';
import { sql as defaultSql, type SqlTag } from '@/lib/db';
import { VERDICTS } from '@/lib/threat-intel/types';
import { serializeEvidence, type LinkwatchStore, type NewReport, type Report } from './types';

const reportRowSchema = z.object({
  id: z.coerce.string(),
  submitter_id: z.coerce.string(),
  url: z.string(),
  domain: z.string(),
  verdict: z.enum(VERDICTS),
  source: z.string(),
  evidence: z.string(),
  created_at: z.coerce.date(),
});

const countRowSchema = z.object({ count: z.coerce.number() });

function toReport(row: z.infer<typeof reportRowSchema>): Report {
  return {
    id: row.id,
    submitterId: row.submitter_id,
    url: row.url,
    domain: row.domain,
    verdict: row.verdict,
    source: row.source,
    evidence: row.evidence,
    createdAt: row.created_at,
  };
}

export class NeonStore implements LinkwatchStore {
  private readonly sql: SqlTag;

  constructor(sql: SqlTag = defaultSql) {
    this.sql = sql;
  }

  async saveReport(report: NewReport): Promise<string> {
    const rows = await this.sql`
      INSERT INTO reports (submitter_id, url, domain, verdict, source, evidence, created_at)
      VALUES (
        ${report.submitterId},
        ${report.url},
        ${report.domain},
        ${report.verdict},
        ${report.source},
        ${serializeEvidence(report.evidence)},
        ${report.createdAt.toISOString()}
      )
      RETURNING id
    `;

    const id = rows[0]?.id;
    if (id === undefined || id === null) {
      throw new Error('Report insert returned no id');
    }
    return String(id);
  }

  async listRecent(limit: number): Promise<Report[]> {
    const rows = await this.sql`
      SELECT id, submitter_id, url, domain, verdict, source, evidence, created_at
      FROM reports
      ORDER BY id DESC
      LIMIT ${limit}
    `;
    return rows.map((row) => toReport(reportRowSchema.parse(row)));
  }

  async countReports(): Promise<number> {
    const rows = await this.sql`SELECT COUNT(*)::int AS count FROM reports`;
    return countRowSchema.parse(rows[0] ?? { count: 0 }).count;
  }

  async addSubscriber(chatId: string, isAdmin: boolean): Promise<boolean> {
    const rows = await this.sql`
      INSERT INTO subscribers (chat_id, joined_at, is_admin)
      VALUES (${chatId}, NOW(), ${isAdmin})
      ON CONFLICT (chat_id) DO NOTHING
      RETURNING chat_id
    `;
    return rows.length > 0;
  }

  async removeSubscriber(chatId: string): Promise<boolean> {
    const rows = await this.sql`
      DELETE FROM subscribers WHERE chat_id = ${chatId} RETURNING chat_id
    `;
    return rows.length > 0;
  }

  async listSubscribers(): Promise<string[]> {
    const rows = await this.sql`SELECT chat_id FROM subscribers ORDER BY joined_at, chat_id`;
    return rows.map((row) => String(row.chat_id));
  }

  async countSubscribers(): Promise<number> {
    const rows = await this.sql`SELECT COUNT(*)::int AS count FROM subscribers`;
    return countRowSchema.parse(rows[0] ?? { count: 0 }).count;
  }

  async hasAlertSince(url: string, since: Date): Promise<boolean> {
    const rows = await this.sql`
      SELECT 1 FROM alert_records
      WHERE url = ${url} AND alerted_at >= ${since.toISOString()}
      LIMIT 1
    `;
    return rows.length > 0;
  }

  async appendAlert(url: string, alertedAt: Date): Promise<void> {
    await this.sql`
      INSERT INTO alert_records (url, alerted_at) VALUES (${url}, ${alertedAt.toISOString()})
    `;
  }

  async recordDelivery(reportId: string, recipientId: string, deliveredAt: Date): Promise<void> {
    await this.sql`
      INSERT INTO alert_deliveries (report_id, sent_to, delivered_at)
      VALUES (${reportId}, ${recipientId}, ${deliveredAt.toISOString()})
    `;
  }
}
