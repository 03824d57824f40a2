import { EventEmitter } from 'events';
import type { Logger } from 'winston';
import type { MessageStore } from '../messages/store.js';
import type {
  IncomingEnvelope,
  Message,
  MessageStatus,
  OutgoingEnvelope,
} from '../messages/types.js';
import {
  INCOMING_PHASES,
  type Handler,
  type IncomingPhase,
  type Phase,
} from '../handlers/types.js';
import type { DeliveryClient } from './delivery.js';

type PhaseSignal = 'continue' | 'abort';

export interface DispatchEngineConfig {
  store: MessageStore;
  delivery: DeliveryClient;
  logger: Logger;
}

/**
 * Runs messages through the handler phase chain.
 *
 * Inbound: filter, parse, handle, default, cleanup, in registration order.
 * Outbound: the single `outgoing` phase, in reverse registration order, so the
 * first handler to see a message coming in is the last to see one going out.
 *
 * A throwing handler never stops the chain: the error is logged, the handler's
 * `exception` hook is told, and its result counts as the phase default.
 *
 * Emits `status` with the updated message after every persisted status write.
 */
export class DispatchEngine extends EventEmitter {
  private store: MessageStore;
  private delivery: DeliveryClient;
  private logger: Logger;

  constructor(config: DispatchEngineConfig) {
    super();
    this.store = config.store;
    this.delivery = config.delivery;
    this.logger = config.logger;
  }

  async runInbound(envelope: IncomingEnvelope, handlers: readonly Handler[]): Promise<Message> {
    for (const phase of INCOMING_PHASES) {
      if (phase === 'default' && envelope.handled) {
        // a handled message skips default and everything after it
        this.logger.debug('Message handled, skipping remaining phases', { messageId: envelope.message.id });
        break;
      }

      this.logger.debug('Inbound phase', { phase, messageId: envelope.message.id });
      const signal = await this.runIncomingPhase(phase, envelope, handlers);
      if (signal === 'abort') break;
    }

    const handled = await this.setStatus(envelope.message.id, 'handled');
    envelope.message = handled;

    while (envelope.responses.length > 0) {
      const reply = envelope.responses.shift();
      if (reply) {
        await this.runOutbound(reply, handled, handlers);
      }
    }

    return handled;
  }

  async runOutbound(
    reply: OutgoingEnvelope,
    source: Message | undefined,
    handlers: readonly Handler[],
  ): Promise<Message> {
    const inResponseTo = source ?? reply.inResponseTo;
    const message = await this.store.createMessage({
      connection: reply.connection,
      text: reply.text,
      direction: 'outbound',
      status: 'pending',
      inResponseTo,
    });

    this.logger.info('Outgoing', {
      messageId: message.id,
      backend: reply.connection.backend,
      recipient: reply.connection.identity,
      text: reply.text,
    });

    for (const handler of [...handlers].reverse()) {
      const continueSending = await this.invoke<boolean>(
        handler,
        'outgoing',
        reply,
        true,
        () => handler.outgoing ? handler.outgoing(reply) : true,
      );

      if (continueSending === false) {
        this.logger.warn('Message cancelled', { messageId: message.id, handler: handler.name });
        return this.setStatus(message.id, 'cancelled');
      }
    }

    return this.deliver(message, reply.params);
  }

  /**
   * Attempt delivery and record the outcome. Used for fresh messages and for
   * retrying queued ones.
   */
  async deliver(message: Message, params: Record<string, string> = {}): Promise<Message> {
    const outcome = await this.delivery.deliver(message, params);
    if (outcome === message.status) {
      return message;
    }
    return this.setStatus(message.id, outcome);
  }

  private async runIncomingPhase(
    phase: IncomingPhase,
    envelope: IncomingEnvelope,
    handlers: readonly Handler[],
  ): Promise<PhaseSignal> {
    for (const handler of handlers) {
      switch (phase) {
        case 'filter': {
          const vetoed = await this.invoke<boolean>(handler, phase, envelope, false,
            () => handler.filter ? handler.filter(envelope) : false);
          if (vetoed === true) {
            this.logger.warn('Message filtered', { messageId: envelope.message.id, handler: handler.name });
            return 'abort';
          }
          break;
        }

        case 'handle': {
          const handled = await this.invoke<boolean>(handler, phase, envelope, false,
            () => handler.handle ? handler.handle(envelope) : false);
          if (handled === true) {
            this.logger.debug('Short-circuited', { phase, handler: handler.name });
            envelope.handled = true;
            return 'continue';
          }
          break;
        }

        case 'default': {
          const handled = await this.invoke<boolean>(handler, phase, envelope, false,
            () => handler.default ? handler.default(envelope) : false);
          if (handled === true) {
            this.logger.debug('Short-circuited', { phase, handler: handler.name });
            return 'continue';
          }
          break;
        }

        case 'parse':
          await this.invoke<void>(handler, phase, envelope, undefined,
            () => handler.parse ? handler.parse(envelope) : undefined);
          break;

        case 'cleanup':
          await this.invoke<void>(handler, phase, envelope, undefined,
            () => handler.cleanup ? handler.cleanup(envelope) : undefined);
          break;
      }
    }

    return 'continue';
  }

  private async invoke<T>(
    handler: Handler,
    phase: Phase,
    envelope: IncomingEnvelope | OutgoingEnvelope,
    fallback: T,
    call: () => T | Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      this.logger.error('Handler failed', {
        handler: handler.name,
        phase,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      await this.notifyException(handler, phase, envelope, error);
      return fallback;
    }
  }

  private async notifyException(
    handler: Handler,
    phase: Phase,
    envelope: IncomingEnvelope | OutgoingEnvelope,
    error: unknown,
  ): Promise<void> {
    if (!handler.exception) return;
    try {
      await handler.exception(error, phase, envelope);
    } catch (hookError) {
      this.logger.error('Handler exception hook failed', {
        handler: handler.name,
        phase,
        error: hookError instanceof Error ? hookError.message : String(hookError),
      });
    }
  }

  private async setStatus(messageId: number, status: MessageStatus): Promise<Message> {
    const message = await this.store.updateStatus(messageId, status);
    this.emit('status', message);
    return message;
  }
}
