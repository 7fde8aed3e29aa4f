import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Tracelet, setTrackClient } from '../client';
import { track } from '../track';
import type { SpanRecord, TraceRecord } from '../tracing-types';

describe('track', () => {
  let fetchSpy: MockInstance<typeof fetch>;
  let client: Tracelet;

  function createClient(disabled = false): Tracelet {
    return new Tracelet({
      apiUrl: 'https://traces.test/api',
      projectName: 'proj',
      flushIntervalMs: 60000,
      maxRetries: 1,
      logLevel: 'silent',
      disabled,
      configPath: '/nonexistent/tracelet/config.json',
    });
  }

  async function sent(): Promise<{ traces: TraceRecord[]; spans: SpanRecord[] }> {
    await client.flush();
    const traces: TraceRecord[] = [];
    const spans: SpanRecord[] = [];
    for (const [url, init] of fetchSpy.mock.calls) {
      const body = JSON.parse(String(init?.body));
      if (String(url).endsWith('/traces/batch')) traces.push(...body.traces);
      if (String(url).endsWith('/spans/batch')) spans.push(...body.spans);
    }
    return { traces, spans };
  }

  beforeEach(() => {
    fetchSpy = vi.spyOn(global, 'fetch').mockImplementation(async () => new Response(null, { status: 204 }));
    client = createClient();
    setTrackClient(client);
  });

  afterEach(async () => {
    await client.close();
    setTrackClient(null);
    vi.restoreAllMocks();
  });

  it('should log a sync call as a trace with one span', async () => {
    const add = track(function add(a: number, b: number) {
      return a + b;
    });

    expect(add(2, 3)).toBe(5);

    const { traces, spans } = await sent();
    expect(traces).toHaveLength(1);
    expect(traces[0]).toMatchObject({
      name: 'add',
      projectName: 'proj',
      input: { arguments: [2, 3] },
      output: { output: 5 },
    });
    expect(spans).toEqual([
      expect.objectContaining({
        traceId: traces[0].id,
        name: 'add',
        type: 'general',
        input: { arguments: [2, 3] },
        output: { output: 5 },
        endTime: expect.any(String),
      }),
    ]);
  });

  it('should nest tracked calls under the active span', async () => {
    const retrieve = track({ name: 'retrieve', type: 'retrieval' }, async (query: string) => [`doc about ${query}`]);
    const pipeline = track({ name: 'pipeline' }, async (query: string) => {
      const docs = await retrieve(query);
      return docs.join('\n');
    });

    await expect(pipeline('tides')).resolves.toBe('doc about tides');

    const { traces, spans } = await sent();
    expect(traces).toHaveLength(1);
    const outer = spans.find((span) => span.name === 'pipeline');
    const inner = spans.find((span) => span.name === 'retrieve');
    expect(outer?.parentSpanId).toBeUndefined();
    expect(inner).toMatchObject({
      parentSpanId: outer?.id,
      traceId: traces[0].id,
      type: 'retrieval',
      output: { output: ['doc about tides'] },
    });
  });

  it('should log a single object argument as the input', async () => {
    const answer = track({ name: 'answer' }, async (request: { question: string }) => ({ text: request.question }));

    await answer({ question: 'why?' });

    const { spans } = await sent();
    expect(spans[0].input).toEqual({ question: 'why?' });
    expect(spans[0].output).toEqual({ text: 'why?' });
  });

  it('should record async errors and rethrow', async () => {
    const failing = track({ name: 'failing' }, async () => {
      throw new Error('model overloaded');
    });

    await expect(failing()).rejects.toThrow('model overloaded');

    const { traces, spans } = await sent();
    expect(traces[0].errorInfo).toMatchObject({ exceptionType: 'Error', message: 'model overloaded' });
    expect(spans[0].errorInfo).toMatchObject({ exceptionType: 'Error', message: 'model overloaded' });
    expect(spans[0].endTime).toEqual(expect.any(String));
  });

  it('should record sync errors and rethrow', async () => {
    const failing = track({ name: 'parse' }, (text: string): unknown => JSON.parse(text));

    expect(() => failing('{')).toThrow(SyntaxError);

    const { spans } = await sent();
    expect(spans[0].errorInfo?.exceptionType).toBe('SyntaxError');
  });

  it('should skip input and output capture when asked', async () => {
    const secret = track({ name: 'secret', captureInput: false, captureOutput: false }, (key: string) => key.length);

    expect(secret('test-secret')).toBe(11);

    const { traces, spans } = await sent();
    expect(traces[0].input).toBeUndefined();
    expect(traces[0].output).toBeUndefined();
    expect(spans[0].input).toBeUndefined();
    expect(spans[0].output).toBeUndefined();
  });

  it('should apply project, tags and metadata', async () => {
    const tagged = track({ name: 'tagged', projectName: 'other', tags: ['beta'], metadata: { version: 2 } }, () => 'ok');

    tagged();

    const { traces, spans } = await sent();
    expect(traces[0]).toMatchObject({ projectName: 'other', tags: ['beta'], metadata: { version: 2 } });
    expect(spans[0]).toMatchObject({ projectName: 'other', tags: ['beta'], metadata: { version: 2 } });
  });

  it('should work as a method decorator', async () => {
    class Agent {
      prefix = '>';

      @track({ type: 'agent' })
      act(input: string): string {
        return `${this.prefix} ${input}`;
      }
    }

    expect(new Agent().act('go')).toBe('> go');

    const { spans } = await sent();
    expect(spans[0]).toMatchObject({ name: 'act', type: 'agent', output: { output: '> go' } });
  });

  it('should use the client given in options', async () => {
    const other = createClient();
    const createTrace = vi.spyOn(other, '_createTrace');
    const fn = track({ name: 'scoped', client: other }, () => 1);

    fn();

    expect(createTrace).toHaveBeenCalledWith(expect.objectContaining({ name: 'scoped' }));
    await other.close();
  });

  it('should only call the function when tracking is disabled', async () => {
    await client.close();
    client = createClient(true);
    setTrackClient(client);

    const double = track({ name: 'double' }, (n: number) => n * 2);

    expect(double(4)).toBe(8);
    await client.flush();
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
