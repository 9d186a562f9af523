import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';
import type { LogEvent } from '../../src/providers/ILogProvider.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

/** Events shipped by the nth fetch call. */
function shipped(call: number): LogEvent[] {
  const body = mockFetch.mock.calls[call]?.[1]?.body;
  if (typeof body !== 'string') throw new Error(`fetch call ${call} had no JSON body`);
  return JSON.parse(body);
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    mockFetch.mockImplementation(async () => new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 60_000,
      flushThreshold: 5,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  // --- buffering ---

  it('should buffer events without sending until flush', () => {
    provider.info('hello');
    provider.warn('world');

    expect(mockFetch).not.toHaveBeenCalled();
    expect(provider.pending).toBe(2);
  });

  it('should drop events below the minimum level', () => {
    const quiet = new AxiomLogProvider({ apiToken: 'test-token', dataset: 'd', flushIntervalMs: 0, minLevel: 'warn' });

    quiet.debug('d');
    quiet.info('i');
    quiet.error('e');

    expect(quiet.pending).toBe(1);
  });

  it('should drop the oldest events once the buffer is full', async () => {
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'd',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 3,
    });

    for (const n of ['1', '2', '3', '4', '5']) capped.info(n);
    expect(capped.pending).toBe(3);
    expect(capped.dropped).toBe(2);

    await capped.flush();
    expect(shipped(0).map((e) => e.message)).toEqual(['3', '4', '5']);
  });

  // --- flush() ---

  it('should send buffered events to Axiom on flush', async () => {
    provider.info('one');
    provider.warn('two', { key: 'val' });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/test-dataset/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const body = shipped(0);
    expect(body).toHaveLength(2);
    expect(body[0]).toMatchObject({ level: 'info', message: 'one' });
    expect(body[1]).toMatchObject({ level: 'warn', message: 'two', fields: { key: 'val' } });
    expect(typeof body[0].timestamp).toBe('string');
    expect(provider.pending).toBe(0);
  });

  it('should include default fields on every event', async () => {
    const tagged = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'd',
      flushIntervalMs: 0,
      defaultFields: { service: 'kindred' },
    });

    tagged.info('one', { operation: 'partnership.create' });
    await tagged.flush();

    expect(shipped(0)[0].fields).toEqual({ service: 'kindred', operation: 'partnership.create' });
  });

  it('should not call fetch when buffer is empty', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should auto-flush when buffer reaches threshold', async () => {
    for (const n of ['1', '2', '3', '4']) provider.info(n);
    expect(mockFetch).not.toHaveBeenCalled();

    provider.info('5');
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(shipped(0)).toHaveLength(5);
  });

  it('should share one request between overlapping flushes', async () => {
    let release: (response: Response) => void = () => {};
    mockFetch.mockImplementationOnce(
      () =>
        new Promise<Response>((resolve) => {
          release = resolve;
        })
    );

    provider.info('first');
    const a = provider.flush();
    const b = provider.flush();
    provider.info('during');
    release(new Response(null, { status: 200 }));
    await Promise.all([a, b]);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(provider.pending).toBe(1);

    await provider.flush();
    expect(shipped(1).map((e) => e.message)).toEqual(['during']);
  });

  // --- failures ---

  it('should keep events and record the status when Axiom rejects them', async () => {
    mockFetch.mockImplementationOnce(async () => new Response('Server Error', { status: 500 }));
    provider.error('bad');

    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.lastFlushError).toBe('Axiom ingest responded 500');
    expect(provider.pending).toBe(1);
  });

  it('should retry retained events after a network failure', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');

    await provider.flush();
    expect(provider.lastFlushError).toBe('Network down');

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(shipped(1).map((e) => e.message)).toEqual(['important']);
    expect(provider.lastFlushError).toBeNull();
  });

  // --- dispose ---

  it('dispose() should flush remaining events', async () => {
    provider.info('final');
    await provider.dispose();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should silently no-op when apiToken is empty', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'x' });
    disabled.info('ignored');
    await disabled.flush();

    expect(mockFetch).not.toHaveBeenCalled();
    expect(disabled.pending).toBe(0);
    await disabled.dispose();
  });
});
