import { DeliveryError, toError } from '../core/errors.js';
import type { Notifier, WebhookNotifierConfig } from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Posts alerts as JSON to an incoming-webhook URL (Slack, Mattermost and
 * similar accept the `text` field).
 */
export class WebhookNotifier implements Notifier {
  readonly channel = 'webhook';

  constructor(private readonly config: WebhookNotifierConfig) {}

  async send(recipient: string, subject: string, body: string): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json; charset=utf-8' },
        body: JSON.stringify({ text: `*${subject}*\n${body}`, recipient, subject }),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (err) {
      throw new DeliveryError(`Webhook request failed: ${toError(err).message}`, this.channel, toError(err));
    }

    if (!response.ok) {
      throw new DeliveryError(`Webhook error: ${response.status} ${response.statusText}`, this.channel);
    }
  }
}
