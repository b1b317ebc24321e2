/**
 * Update Router
 *
 * Maps one Telegram update to a command handler. Shared by the webhook
 * route and the polling script.
 */

import type { MessageEntity, TelegramMessage, TelegramUpdate } from '@/lib/api/schemas';
import { normalize, normalizeCandidate, type LinkAnnotation } from '@/lib/links/normalizer';
import { loggers } from '@/lib/logging/logger';
import type { Submission, SubmissionOutcome } from '@/lib/reports/service';
import type { ReportStore, SubscriberStore } from '@/lib/reports/types';
import * as messages from './messages';

export const DEFAULT_RECENT = 10;
export const MAX_RECENT = 25;

export interface ReplySender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

export interface Submitter {
  submit(submission: Submission): Promise<SubmissionOutcome>;
}

export interface UpdateRouterDeps {
  sender: ReplySender;
  service: Submitter;
  store: SubscriberStore & ReportStore;
  adminIds: ReadonlySet<string>;
  /** Commands addressed to another bot (`/cmd@otherbot`) are ignored when set */
  botUsername?: string;
  now?: () => Date;
}

export interface ParsedCommand {
  name: string;
  args: string[];
  /** Bot username after `@`, if any */
  target?: string;
}

/**
 * `/Report@SomeBot a b` -> { name: 'report', target: 'somebot', args: ['a', 'b'] }
 */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) return null;

  const [head, ...args] = trimmed.split(/\s+/);
  const match = /^\/([a-zA-Z0-9_]+)(?:@([a-zA-Z0-9_]+))?$/.exec(head);
  if (!match) return null;

  return {
    name: match[1].toLowerCase(),
    args,
    ...(match[2] ? { target: match[2].toLowerCase() } : {}),
  };
}

export function clampRecent(arg: string | undefined): number {
  const parsed = arg === undefined ? NaN : Number.parseInt(arg, 10);
  const n = Number.isNaN(parsed) ? DEFAULT_RECENT : parsed;
  return Math.max(1, Math.min(n, MAX_RECENT));
}

function toLinkAnnotations(entities: readonly MessageEntity[] = []): LinkAnnotation[] {
  const links: LinkAnnotation[] = [];
  for (const entity of entities) {
    if (entity.type === 'url') {
      links.push({ type: 'url', offset: entity.offset, length: entity.length });
    } else if (entity.type === 'text_link' && entity.url) {
      links.push({ type: 'text_link', offset: entity.offset, length: entity.length, url: entity.url });
    }
  }
  return links;
}

function normalizeArgs(args: readonly string[]): string[] {
  const urls = new Set<string>();
  for (const arg of args) {
    const url = normalizeCandidate(arg);
    if (url) urls.add(url);
  }
  return [...urls];
}

export class UpdateRouter {
  private readonly log = loggers.bot;
  private readonly now: () => Date;

  constructor(private readonly deps: UpdateRouterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    if (!message) {
      this.log.debug('Ignoring update without message', { updateId: update.update_id });
      return;
    }

    const text = message.text ?? message.caption ?? '';
    const command = parseCommand(text);

    if (command) {
      if (command.target && this.deps.botUsername && command.target !== this.deps.botUsername.toLowerCase()) {
        return;
      }
      await this.dispatch(command, message);
      return;
    }

    const urls = normalize(text, toLinkAnnotations(message.entities ?? message.caption_entities));
    if (urls.length > 0) {
      await this.submit(message, urls, false);
    }
  }

  private async dispatch(command: ParsedCommand, message: TelegramMessage): Promise<void> {
    const chatId = String(message.chat.id);
    const isAdmin = this.deps.adminIds.has(chatId);

    switch (command.name) {
      case 'start':
        await this.deps.store.addSubscriber(chatId, isAdmin);
        await this.reply(chatId, messages.WELCOME);
        return;
      case 'help':
        await this.reply(chatId, messages.WELCOME);
        return;
      case 'subscribe':
        await this.deps.store.addSubscriber(chatId, isAdmin);
        await this.reply(chatId, messages.SUBSCRIBED);
        return;
      case 'unsubscribe':
        await this.deps.store.removeSubscriber(chatId);
        await this.reply(chatId, messages.UNSUBSCRIBED);
        return;
      case 'report':
        if (command.args.length === 0) {
          await this.reply(chatId, messages.REPORT_USAGE);
          return;
        }
        await this.submit(message, normalizeArgs(command.args), false);
        return;
      case 'check':
        if (command.args.length === 0) {
          await this.reply(chatId, messages.CHECK_USAGE);
          return;
        }
        await this.submit(message, normalizeArgs(command.args), true);
        return;
      case 'recent': {
        const reports = await this.deps.store.listRecent(clampRecent(command.args[0]));
        await this.reply(chatId, messages.recentReports(reports));
        return;
      }
      case 'health': {
        if (!isAdmin) return;
        const [subscribers, reports] = await Promise.all([
          this.deps.store.countSubscribers(),
          this.deps.store.countReports(),
        ]);
        await this.reply(chatId, messages.healthSummary(subscribers, reports, this.now()));
        return;
      }
      default:
        this.log.debug('Unknown command', { command: command.name });
    }
  }

  private async submit(message: TelegramMessage, urls: string[], silent: boolean): Promise<void> {
    const chatId = String(message.chat.id);
    const outcome = await this.deps.service.submit({ submitterId: chatId, urls, silent });

    switch (outcome.kind) {
      case 'no_urls':
        await this.reply(chatId, messages.NO_URLS);
        return;
      case 'rate_limited':
        await this.reply(chatId, messages.rateLimited(outcome.retryAfterSeconds));
        return;
      case 'checked': {
        if (silent) {
          const lines = outcome.results.map((r) => messages.checkResult(r.url, r.verdict, r.source));
          await this.reply(chatId, lines.join('\n\n'));
          return;
        }
        const alerted = outcome.results.filter((r) => r.alerted).length;
        await this.reply(chatId, messages.reportAcknowledged(outcome.results.length, alerted));
        return;
      }
    }
  }

  private async reply(chatId: string, text: string): Promise<void> {
    await this.deps.sender.sendMessage(chatId, text);
  }
}
