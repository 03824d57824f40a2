import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import winston from 'winston';
import { createApp, resolveConfig, type App, type Handler } from '../src/index.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const logger = winston.createLogger({ silent: true });

function buildApp(overrides: Record<string, unknown> = {}, handlers: Record<string, () => Promise<Handler>> = {}): App {
  const config = resolveConfig({
    delivery: { url: 'http://gw.test/cgi-bin/sendsms?to={recipient}&text={text}&id={id}' },
    database: { path: ':memory:' },
    handlers: [
      { name: 'message-log' },
      { name: 'blacklist', senders: ['+1666'] },
      { name: 'echo', keyword: 'echo', prefix: 'echo: ' },
      { name: 'default-reply', text: 'Unknown command' },
    ],
    ...overrides,
  }, {});
  return createApp(config, { logger, handlers });
}

describe('textrouter end to end', () => {
  let app: App;

  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterEach(() => {
    app.close();
  });

  it('should echo a keyword message and deliver the reply', async () => {
    mockFetch.mockResolvedValue({ status: 202 });
    app = buildApp();

    const message = await app.router.handleIncoming('demo-backend', '+1555', 'echo hello');
    const replies = await app.store.findResponses(message.id);

    expect(message.status).toBe('handled');
    expect(replies).toHaveLength(1);
    expect(replies[0]).toMatchObject({ text: 'echo: hello', status: 'sent', direction: 'outbound' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe(
      `http://gw.test/cgi-bin/sendsms?to=%2B1555&text=echo%3A%20hello&id=${replies[0].id}`,
    );
  });

  it('should fall back to the default reply for anything else', async () => {
    mockFetch.mockResolvedValue({ status: 200 });
    app = buildApp();

    const message = await app.router.handleIncoming('demo-backend', '+1555', 'what?');
    const replies = await app.store.findResponses(message.id);

    expect(replies.map(r => r.text)).toEqual(['Unknown command']);
  });

  it('should drop blacklisted senders without replying', async () => {
    app = buildApp();

    const message = await app.router.handleIncoming('demo-backend', '+1666', 'echo hello');

    expect(message.status).toBe('handled');
    expect(await app.store.findResponses(message.id)).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should queue replies when no gateway is configured and flush them later', async () => {
    app = buildApp({ delivery: { url: '' } });

    const message = await app.router.handleIncoming('demo-backend', '+1555', 'echo later');
    const [reply] = await app.store.findResponses(message.id);
    expect(reply.status).toBe('queued');
    expect(app.router.getOutbox().map(m => m.id)).toEqual([reply.id]);

    const result = await app.router.flushOutbox();

    expect(result).toEqual({ sent: 0, queued: 1 });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should let custom handlers cancel outgoing traffic', async () => {
    app = buildApp(
      { handlers: ['gatekeeper', { name: 'echo' }] },
      { gatekeeper: async () => ({ name: 'gatekeeper', outgoing: () => false }) },
    );

    const message = await app.router.handleIncoming('demo-backend', '+1555', 'hello');
    const [reply] = await app.store.findResponses(message.id);

    expect(reply.status).toBe('cancelled');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should record gateway confirmations', async () => {
    mockFetch.mockResolvedValue({ status: 500 });
    app = buildApp();
    const connection = await app.router.connectionFor('demo-backend', '+1777');

    const queued = await app.router.sendOutgoing(connection, 'reminder');
    const sent = await app.router.markSent(queued.id);

    expect(queued.status).toBe('queued');
    expect(sent.status).toBe('sent');
    expect(await app.store.findByStatus('queued')).toEqual([]);
  });
});
