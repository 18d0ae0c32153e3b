import type { NotifyConfig } from '../config';
import type { Notifier } from '../ingest/types';
import { logInfo } from '../observability/logger';
import { EmailNotifier } from './email-notifier';

/** Writes notifications to the log instead of delivering them. */
export class LogNotifier implements Notifier {
  notify(title: string, body: string, tag: string): void {
    logInfo(title, { url: body, site: tag });
  }
}

export function createNotifier(config: NotifyConfig): Notifier {
  switch (config.provider) {
    case 'email':
      return new EmailNotifier(config.smtp);
    case 'log':
      return new LogNotifier();
  }
}

export { EmailNotifier } from './email-notifier';
