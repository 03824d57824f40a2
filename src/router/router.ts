import type { Logger } from 'winston';
import { createIncomingEnvelope, createOutgoingEnvelope } from '../messages/envelope.js';
import type { ConnectionResolver, MessageStore } from '../messages/store.js';
import type { Connection, Message } from '../messages/types.js';
import { instantiateHandlers } from '../handlers/registry.js';
import type {
  Handler,
  HandlerEntry,
  HandlerRegistry,
  RouterHandle,
} from '../handlers/types.js';
import type { DeliveryClient } from './delivery.js';
import { DispatchEngine } from './dispatch.js';

export interface RouterConfig {
  store: MessageStore;
  connections: ConnectionResolver;
  delivery: DeliveryClient;
  registry: HandlerRegistry;
  /** Handler configuration, in dispatch order */
  handlers: HandlerEntry[];
  logger: Logger;
}

export interface SendOptions {
  source?: Message;
  params?: Record<string, string>;
}

export interface FlushResult {
  sent: number;
  queued: number;
}

/**
 * Entry point for message traffic. Starts lazily on first use: handlers are
 * instantiated and started, and the outbox is loaded from queued messages.
 * There is no worker pool; each call dispatches on the caller's own chain.
 */
export class Router implements RouterHandle {
  private store: MessageStore;
  private connections: ConnectionResolver;
  private registry: HandlerRegistry;
  private handlerEntries: HandlerEntry[];
  private logger: Logger;
  private engine: DispatchEngine;

  private handlers: Handler[] = [];
  private outbox = new Map<number, Message>();
  private startup: Promise<void> | null = null;
  private flushing: Promise<FlushResult> | null = null;
  private starting = false;
  private started = false;

  constructor(config: RouterConfig) {
    this.store = config.store;
    this.connections = config.connections;
    this.registry = config.registry;
    this.handlerEntries = config.handlers;
    this.logger = config.logger;

    this.engine = new DispatchEngine({
      store: config.store,
      delivery: config.delivery,
      logger: config.logger,
    });
    this.engine.on('status', (message: Message) => this.trackOutbox(message));
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Start the router once. Concurrent callers share the same startup; if it
   * fails, every waiting caller sees the error and the next call tries again.
   */
  ensureStarted(): Promise<void> {
    if (!this.startup) {
      this.startup = this.start().catch((error: unknown) => {
        this.startup = null;
        throw error;
      });
    }
    return this.startup;
  }

  async handleIncoming(backend: string, sender: string, text: string): Promise<Message> {
    await this.ensureStarted();

    const connection = await this.connections.getOrCreate(backend, sender);
    const message = await this.store.createMessage({
      connection,
      text,
      direction: 'inbound',
      status: 'received',
    });

    this.logger.info('Incoming', { messageId: message.id, backend, sender, text });
    return this.engine.runInbound(createIncomingEnvelope(message), this.handlers);
  }

  /**
   * Send a message outside of inbound dispatch. It passes through the same
   * `outgoing` phase as a reply; a cancelled message comes back with status
   * `cancelled`. Handlers may call this from `start()`: the handler list is
   * already in place then, so the send does not wait on startup.
   */
  async sendOutgoing(connection: Connection, text: string, options: SendOptions = {}): Promise<Message> {
    if (!this.starting) {
      await this.ensureStarted();
    }
    const envelope = createOutgoingEnvelope(connection, text, {
      inResponseTo: options.source,
      params: options.params,
    });
    return this.engine.runOutbound(envelope, options.source, this.handlers);
  }

  async connectionFor(backend: string, identity: string): Promise<Connection> {
    return this.connections.getOrCreate(backend, identity);
  }

  /**
   * Record a gateway's confirmation that a message went out.
   */
  async markSent(messageId: number): Promise<Message> {
    const message = await this.store.updateStatus(messageId, 'sent');
    this.trackOutbox(message);
    return message;
  }

  /** Messages waiting for delivery, oldest first. */
  getOutbox(): Message[] {
    return [...this.outbox.values()].sort((a, b) => a.id - b.id);
  }

  /**
   * Retry delivery of every queued message. Outgoing phases are not run again;
   * they already approved these messages. Overlapping calls share one flush.
   */
  flushOutbox(): Promise<FlushResult> {
    if (!this.flushing) {
      this.flushing = this.flush().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  private async flush(): Promise<FlushResult> {
    await this.ensureStarted();

    const result: FlushResult = { sent: 0, queued: 0 };
    for (const message of this.getOutbox()) {
      // confirmed by the gateway since the flush began
      if (!this.outbox.has(message.id)) {
        continue;
      }
      const updated = await this.engine.deliver(message);
      if (updated.status === 'sent') {
        result.sent++;
      } else {
        result.queued++;
      }
    }

    this.logger.info('Outbox flushed', { ...result });
    return result;
  }

  private async start(): Promise<void> {
    const handlers = await instantiateHandlers(this.handlerEntries, this.registry, {
      router: this,
      logger: this.logger,
    });

    const queued = await this.store.findByStatus('queued');

    this.handlers = handlers;
    this.outbox = new Map(queued.map(m => [m.id, m]));
    this.starting = true;
    try {
      for (const handler of handlers) {
        if (handler.start) {
          await handler.start();
        }
        this.logger.debug('Handler started', { handler: handler.name });
      }
    } catch (error) {
      this.handlers = [];
      throw error;
    } finally {
      this.starting = false;
    }

    this.started = true;

    this.logger.info('Router started', {
      handlers: handlers.map(h => h.name),
      outbox: queued.length,
    });
  }

  private trackOutbox(message: Message): void {
    if (message.status === 'queued') {
      this.outbox.set(message.id, message);
    } else {
      this.outbox.delete(message.id);
    }
  }
}
