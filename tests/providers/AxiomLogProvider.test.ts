import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function sentBatch(call: number): Array<Record<string, unknown>> {
  const body = mockFetch.mock.calls[call]?.[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : [];
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      flushThreshold: 5,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  it('should buffer events until flush', () => {
    provider.info('hello');
    provider.warn('world');
    expect(mockFetch).not.toHaveBeenCalled();
    expect(provider.pending).toBe(2);
  });

  it('should send buffered events to the dataset ingest endpoint', async () => {
    provider.info('one');
    provider.warn('two', { claimId: 'c-1' });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const call = mockFetch.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('https://api.axiom.co/v1/datasets/test-dataset/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const batch = sentBatch(0);
    expect(batch).toHaveLength(2);
    expect(batch[0]).toMatchObject({ level: 'info', message: 'one' });
    expect(batch[1]).toMatchObject({ level: 'warn', message: 'two', fields: { claimId: 'c-1' } });
    expect(typeof batch[0]?.timestamp).toBe('string');
    expect(provider.pending).toBe(0);
  });

  it('should not call fetch for an empty buffer', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should flush on reaching the threshold', async () => {
    for (let i = 1; i <= 5; i++) provider.info(String(i));
    await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
    expect(sentBatch(0)).toHaveLength(5);
  });

  it('should drop debug events at the default level', async () => {
    provider.debug('noise');
    provider.info('signal');
    await provider.flush();
    expect(sentBatch(0).map((e) => e.message)).toEqual(['signal']);
  });

  it('should send debug events when minLevel is debug', async () => {
    const verbose = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      minLevel: 'debug',
    });
    verbose.debug('noise');
    await verbose.dispose();
    expect(sentBatch(0).map((e) => e.level)).toEqual(['debug']);
  });

  it('should stamp the service name under event fields', async () => {
    const named = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      service: 'decision-engine',
    });
    named.info('ready', { region: 'eu' });
    named.info('bare');
    await named.dispose();

    const batch = sentBatch(0);
    expect(batch[0]?.fields).toEqual({ service: 'decision-engine', region: 'eu' });
    expect(batch[1]?.fields).toEqual({ service: 'decision-engine' });
  });

  it('should keep the batch when the ingest API answers with an error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 500 }));
    provider.error('bad');
    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.pending).toBe(1);
  });

  it('should retry retained events on the next flush after a network error', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');
    await provider.flush();
    expect(provider.pending).toBe(1);

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBatch(1).map((e) => e.message)).toEqual(['important']);
    expect(provider.pending).toBe(0);
  });

  it('should drop the oldest events past maxBufferSize', async () => {
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 3,
    });
    for (const message of ['a', 'b', 'c', 'd', 'e']) capped.info(message);

    expect(capped.pending).toBe(3);
    expect(capped.dropped).toBe(2);

    await capped.dispose();
    expect(sentBatch(0).map((e) => e.message)).toEqual(['c', 'd', 'e']);
  });

  it('should keep events logged while a flush is in flight', async () => {
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 3,
    });
    let release: (response: Response) => void = () => {};
    mockFetch.mockImplementationOnce(
      () =>
        new Promise<Response>((resolve) => {
          release = resolve;
        })
    );

    for (const message of ['a', 'b', 'c']) capped.info(message);
    const inFlight = capped.flush();
    // Overflow trims 'a' and 'b' from the front while the request is pending
    capped.info('d');
    capped.info('e');
    release(new Response(null, { status: 200 }));
    await inFlight;

    expect(sentBatch(0).map((e) => e.message)).toEqual(['a', 'b', 'c']);
    expect(capped.dropped).toBe(2);
    expect(capped.pending).toBe(2);

    await capped.dispose();
    expect(sentBatch(1).map((e) => e.message)).toEqual(['d', 'e']);
  });

  it('should merge child bindings into shipped events', async () => {
    provider.child({ component: 'claims' }).warn('slow', { ms: 900 });
    await provider.flush();
    expect(sentBatch(0)[0]?.fields).toEqual({ component: 'claims', ms: 900 });
  });

  it('should no-op without an api token', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'x' });
    disabled.info('ignored');
    await disabled.dispose();
    expect(disabled.pending).toBe(0);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
