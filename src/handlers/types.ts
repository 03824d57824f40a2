import type { Logger } from 'winston';
import type {
  Connection,
  IncomingEnvelope,
  Message,
  OutgoingEnvelope,
} from '../messages/types.js';

export const INCOMING_PHASES = ['filter', 'parse', 'handle', 'default', 'cleanup'] as const;
export const OUTGOING_PHASES = ['outgoing'] as const;

export type IncomingPhase = typeof INCOMING_PHASES[number];
export type OutgoingPhase = typeof OUTGOING_PHASES[number];
export type Phase = IncomingPhase | OutgoingPhase;

type MaybePromise<T> = T | Promise<T>;

/**
 * A handler application. Every phase method is optional; an absent method
 * behaves as "not handled" for inbound phases and "continue" for `outgoing`.
 */
export interface Handler {
  readonly name: string;

  /**
   * Called once at router startup, in handler order. A failure here aborts
   * startup. Every handler is registered by then, so messages sent from here
   * pass through the full `outgoing` phase.
   */
  start?(): MaybePromise<void>;

  /** Return true to veto the message: no further inbound phase runs. */
  filter?(envelope: IncomingEnvelope): MaybePromise<boolean>;
  parse?(envelope: IncomingEnvelope): MaybePromise<void>;
  /** Return true to mark the message handled and stop the phase. */
  handle?(envelope: IncomingEnvelope): MaybePromise<boolean>;
  /** Only runs while nothing has handled the message. True stops the phase. */
  default?(envelope: IncomingEnvelope): MaybePromise<boolean>;
  cleanup?(envelope: IncomingEnvelope): MaybePromise<void>;

  /** Return false to cancel the message before delivery. */
  outgoing?(envelope: OutgoingEnvelope): MaybePromise<boolean>;

  /** Notified when one of this handler's phase methods throws. */
  exception?(
    error: unknown,
    phase: Phase,
    envelope: IncomingEnvelope | OutgoingEnvelope,
  ): MaybePromise<void>;
}

/**
 * The part of the router handlers may call back into.
 */
export interface RouterHandle {
  sendOutgoing(
    connection: Connection,
    text: string,
    options?: { source?: Message; params?: Record<string, string> },
  ): Promise<Message>;
  connectionFor(backend: string, identity: string): Promise<Connection>;
}

export interface HandlerEntry {
  name: string;
  [key: string]: unknown;
}

export interface HandlerContext {
  router: RouterHandle;
  logger: Logger;
  config: HandlerEntry;
}

export type HandlerFactory = (ctx: HandlerContext) => Promise<Handler>;
export type HandlerRegistry = Record<string, HandlerFactory>;
