import type { MonitorConfig } from '../core/types.js';
import { ConfigError } from '../core/errors.js';
import { SmtpNotifier } from './smtp-notifier.js';
import { WebhookNotifier } from './webhook-notifier.js';
import type { Notifier } from './types.js';

export { SmtpNotifier } from './smtp-notifier.js';
export { WebhookNotifier } from './webhook-notifier.js';
export type { Notifier, SmtpNotifierConfig, WebhookNotifierConfig } from './types.js';

/**
 * Build the configured notifier; `none` yields undefined.
 */
export function createNotifier(config: MonitorConfig['notifier']): Notifier | undefined {
  switch (config.channel) {
    case 'none':
      return undefined;

    case 'smtp': {
      const { host, from, recipientDomain } = config.smtp;
      if (!host || !from || !recipientDomain) {
        throw new ConfigError('notifier.smtp needs host, from and recipientDomain');
      }
      return new SmtpNotifier({
        host,
        port: config.smtp.port,
        secure: config.smtp.secure,
        user: config.smtp.user,
        password: config.smtp.password,
        from,
        recipientDomain,
      });
    }

    case 'webhook': {
      if (!config.webhook.url) {
        throw new ConfigError('notifier.webhook.url is required');
      }
      return new WebhookNotifier({ url: config.webhook.url });
    }
  }
}
