export interface Notifier {
  /** Channel name used in logs and DeliveryError */
  readonly channel: string;
  /**
   * Deliver one message. `recipient` is a user identity (normally the process
   * owner); adapters map it to an address. Rejects with DeliveryError.
   */
  send(recipient: string, subject: string, body: string): Promise<void>;
}

export interface SmtpNotifierConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
  /** Appended to bare user names: alice -> alice@<recipientDomain> */
  recipientDomain: string;
}

export interface WebhookNotifierConfig {
  url: string;
  timeoutMs?: number;
}
