import type { Logger } from 'winston';
import type { Message } from '../messages/types.js';

export type DeliveryOutcome = 'sent' | 'queued';

export interface DeliveryClientConfig {
  /**
   * Gateway URL template. `{backend}`, `{recipient}`, `{text}` and `{id}` are
   * replaced with URL-encoded values, as is any extra parameter name. An
   * extra parameter with a core name replaces the core value.
   * Delivery is disabled (everything queues) when unset.
   */
  url?: string;
  timeoutMs?: number;
  logger: Logger;
}

const PLACEHOLDER = /\{(\w+)\}/g;

export function buildDeliveryUrl(template: string, params: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (_match, key: string) =>
    encodeURIComponent(Object.hasOwn(params, key) ? params[key] : ''),
  );
}

/**
 * Hands messages to an HTTP gateway (Kannel style: a GET against a templated
 * URL). Never throws; every failure becomes `queued`.
 */
export class DeliveryClient {
  private url: string | undefined;
  private timeoutMs: number | undefined;
  private logger: Logger;

  constructor(config: DeliveryClientConfig) {
    this.url = config.url || undefined;
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger;
  }

  get configured(): boolean {
    return this.url !== undefined;
  }

  async deliver(message: Message, extra: Record<string, string> = {}): Promise<DeliveryOutcome> {
    if (!this.url) {
      this.logger.warn('No delivery URL configured, queuing message for later delivery', {
        messageId: message.id,
      });
      return 'queued';
    }

    const url = buildDeliveryUrl(this.url, {
      backend: message.connection.backend,
      recipient: message.connection.identity,
      text: message.text,
      id: String(message.id),
      ...extra,
    });

    try {
      const response = await fetch(url, {
        method: 'GET',
        signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });

      // Kannel answers 202; any 2xx counts as accepted
      if (response.status >= 200 && response.status < 300) {
        this.logger.info('Message sent', { messageId: message.id, status: response.status });
        return 'sent';
      }

      this.logger.error('Message not sent, queued for later delivery', {
        messageId: message.id,
        status: response.status,
      });
      return 'queued';
    } catch (error) {
      this.logger.error('Message not sent, queued for later delivery', {
        messageId: message.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'queued';
    }
  }
}
