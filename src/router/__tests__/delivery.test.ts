import { describe, it, expect, vi, beforeEach } from 'vitest';
import winston from 'winston';
import { DeliveryClient, buildDeliveryUrl } from '../delivery.js';
import type { Message } from '../../messages/types.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const logger = winston.createLogger({ silent: true });

function makeMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: 42,
    connection: { id: 1, backend: 'demo-backend', identity: '+1555' },
    text: 'hi back',
    direction: 'outbound',
    status: 'pending',
    createdAt: new Date('2024-01-01T00:00:00Z'),
    inResponseTo: null,
    ...overrides,
  };
}

describe('buildDeliveryUrl', () => {
  it('should substitute and encode every placeholder', () => {
    const url = buildDeliveryUrl(
      'http://gw.test/send?backend={backend}&to={recipient}&text={text}&id={id}',
      { backend: 'demo-backend', recipient: '+1555', text: 'hi back & bye', id: '42' },
    );
    expect(url).toBe('http://gw.test/send?backend=demo-backend&to=%2B1555&text=hi%20back%20%26%20bye&id=42');
  });

  it('should blank placeholders without a value', () => {
    expect(buildDeliveryUrl('http://gw.test/?smsc={smsc}&id={id}', { id: '7' }))
      .toBe('http://gw.test/?smsc=&id=7');
  });
});

describe('DeliveryClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should queue without a request when no URL is configured', async () => {
    const client = new DeliveryClient({ logger });

    expect(client.configured).toBe(false);
    expect(await client.deliver(makeMessage())).toBe('queued');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should treat an empty URL as unconfigured', async () => {
    const client = new DeliveryClient({ url: '', logger });
    expect(await client.deliver(makeMessage())).toBe('queued');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should report sent for a 200 response', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200 });
    const client = new DeliveryClient({ url: 'http://gw.test/send?to={recipient}&text={text}', logger });

    expect(await client.deliver(makeMessage())).toBe('sent');
    expect(mockFetch).toHaveBeenCalledWith(
      'http://gw.test/send?to=%2B1555&text=hi%20back',
      expect.objectContaining({ method: 'GET' }),
    );
  });

  it('should accept any 2xx status', async () => {
    mockFetch.mockResolvedValueOnce({ status: 202 });
    const client = new DeliveryClient({ url: 'http://gw.test/send', logger });
    expect(await client.deliver(makeMessage())).toBe('sent');
  });

  it('should queue on a non-2xx status', async () => {
    mockFetch.mockResolvedValueOnce({ status: 302 });
    const client = new DeliveryClient({ url: 'http://gw.test/send', logger });
    expect(await client.deliver(makeMessage())).toBe('queued');
  });

  it('should queue on a transport error without throwing', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const client = new DeliveryClient({ url: 'http://gw.test/send', logger });
    expect(await client.deliver(makeMessage())).toBe('queued');
  });

  it('should pass extra parameters into the template', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200 });
    const client = new DeliveryClient({ url: 'http://gw.test/send?smsc={smsc}&id={id}', logger });

    await client.deliver(makeMessage(), { smsc: 'modem 1' });

    expect(mockFetch.mock.calls[0][0]).toBe('http://gw.test/send?smsc=modem%201&id=42');
  });

  it('should let backend-specific parameters replace message fields', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200 });
    const client = new DeliveryClient({ url: 'http://gw.test/send?to={recipient}&id={id}', logger });

    await client.deliver(makeMessage(), { recipient: '+1999' });

    expect(mockFetch.mock.calls[0][0]).toBe('http://gw.test/send?to=%2B1999&id=42');
  });

  it('should bound the request with a timeout signal when configured', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200 });
    const client = new DeliveryClient({ url: 'http://gw.test/send', timeoutMs: 5000, logger });

    await client.deliver(makeMessage());

    expect(mockFetch.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
  });
});
