/**
 * Unit tests for slack sink
 */

import type { TimerAPI } from '$types';

import type { PostJsonFn, SlackSinkConfig } from '../types';
import { createSlackSink, postJson } from './slack-sink';

function flushPromises(): Promise<void> {
  return new Promise(function(resolve) {
    setImmediate(resolve);
  });
}

describe('createSlackSink', () => {
  const WEBHOOK = 'https://hooks.example.test/services/test-secret';

  let post: jest.Mock<ReturnType<PostJsonFn>, Parameters<PostJsonFn>>;
  let mockTimer: jest.Mocked<TimerAPI>;
  let scheduled: Array<() => void>;
  let warnSpy: jest.SpyInstance;

  function config(overrides: Partial<SlackSinkConfig> = {}): SlackSinkConfig {
    return {
      enabled: true,
      webhookUrl: WEBHOOK,
      bufferSize: 10,
      retryDelayMs: 1000,
      maxRetries: 5,
      ...overrides
    };
  }

  async function runNextRetry(): Promise<void> {
    const next = scheduled.shift();
    if (!next) {
      throw new Error('no retry scheduled');
    }
    next();
    await flushPromises();
  }

  beforeEach(() => {
    scheduled = [];
    post = jest.fn<ReturnType<PostJsonFn>, Parameters<PostJsonFn>>().mockResolvedValue(undefined);
    mockTimer = {
      set: jest.fn((_ms: number, _repeat: boolean, callback: () => void) => {
        scheduled.push(callback);
        return scheduled.length;
      }),
      clear: jest.fn()
    };
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('start', () => {
    test('should report disabled sinks as successful', () => {
      const sink = createSlackSink(post, mockTimer, config({ enabled: false }));

      expect(sink.start()).toEqual({ ok: true, message: 'Slack disabled' });
    });

    test('should fail when the webhook URL is missing', () => {
      const sink = createSlackSink(post, mockTimer, config({ webhookUrl: '' }));

      expect(sink.start()).toEqual({ ok: false, message: 'Slack enabled but SLACK_WEBHOOK_URL is not set' });
    });

    test('should accept an http(s) webhook URL', () => {
      const sink = createSlackSink(post, mockTimer, config());

      expect(sink.start()).toEqual({ ok: true, message: 'Slack webhook configured' });
    });
  });

  describe('write', () => {
    test('should ignore messages before start', () => {
      const sink = createSlackSink(post, mockTimer, config());

      sink.write('hello');

      expect(post).not.toHaveBeenCalled();
    });

    test('should ignore messages when disabled', () => {
      const sink = createSlackSink(post, mockTimer, config({ enabled: false }));
      sink.start();

      sink.write('hello');

      expect(post).not.toHaveBeenCalled();
    });

    test('should post the message text', async () => {
      const sink = createSlackSink(post, mockTimer, config());
      sink.start();

      sink.write('fan bank 1 rejected command');
      await flushPromises();

      expect(post).toHaveBeenCalledWith(WEBHOOK, { text: 'fan bank 1 rejected command' });
      expect(mockTimer.set).not.toHaveBeenCalled();
    });

    test('should buffer a failed message and schedule a retry', async () => {
      post.mockRejectedValue(new Error('HTTP 500 Internal Server Error'));
      const sink = createSlackSink(post, mockTimer, config());
      sink.start();

      sink.write('message');
      await flushPromises();

      expect(mockTimer.set).toHaveBeenCalledWith(1000, false, expect.any(Function));
      expect(warnSpy).toHaveBeenCalledWith('Slack send failed: HTTP 500 Internal Server Error');

      post.mockResolvedValue(undefined);
      await runNextRetry();
      expect(post.mock.calls).toEqual([[WEBHOOK, { text: 'message' }], [WEBHOOK, { text: 'message' }]]);
    });

    test('should buffer a message when the poster throws synchronously', async () => {
      post.mockImplementation(() => {
        throw new Error('bad url');
      });
      const sink = createSlackSink(post, mockTimer, config());
      sink.start();

      sink.write('message');
      await flushPromises();

      expect(warnSpy).toHaveBeenCalledWith('Slack send exception: Error: bad url');
      expect(mockTimer.set).toHaveBeenCalledWith(1000, false, expect.any(Function));
    });

    test('should drop the oldest message when the buffer is full', async () => {
      post.mockRejectedValue(new Error('offline'));
      const sink = createSlackSink(post, mockTimer, config({ bufferSize: 2 }));
      sink.start();

      sink.write('a');
      sink.write('b');
      sink.write('c');
      await flushPromises();

      expect(warnSpy).toHaveBeenCalledWith('Slack buffer full, dropping oldest message: a');
      expect(mockTimer.set).toHaveBeenCalledTimes(1);

      post.mockResolvedValue(undefined);
      await runNextRetry();
      expect(post.mock.calls.slice(3)).toEqual([[WEBHOOK, { text: 'b' }], [WEBHOOK, { text: 'c' }]]);
    });
  });

  describe('retry', () => {
    test('should send buffered messages once Slack recovers', async () => {
      post.mockRejectedValueOnce(new Error('offline'));
      const sink = createSlackSink(post, mockTimer, config());
      sink.start();
      sink.write('queued');
      await flushPromises();

      await runNextRetry();

      expect(post).toHaveBeenCalledTimes(2);
      expect(post).toHaveBeenLastCalledWith(WEBHOOK, { text: 'queued' });
      expect(scheduled).toHaveLength(0);
    });

    test('should back off exponentially and drop after max retries', async () => {
      post.mockRejectedValue(new Error('offline'));
      const sink = createSlackSink(post, mockTimer, config());
      sink.start();
      sink.write('doomed');
      await flushPromises();

      for (let i = 0; i < 5; i++) {
        await runNextRetry();
      }

      expect(mockTimer.set.mock.calls.map(function(call) { return call[0]; })).toEqual([1000, 2000, 4000, 8000, 16000]);
      expect(warnSpy).toHaveBeenCalledWith('Slack message dropped after 5 retries');
      expect(scheduled).toHaveLength(0);
    });

    test('should cap the retry delay at 60 seconds', async () => {
      post.mockRejectedValue(new Error('offline'));
      const sink = createSlackSink(post, mockTimer, config({ retryDelayMs: 20000, maxRetries: 10 }));
      sink.start();
      sink.write('slow');
      await flushPromises();

      for (let i = 0; i < 3; i++) {
        await runNextRetry();
      }

      expect(mockTimer.set.mock.calls.map(function(call) { return call[0]; })).toEqual([20000, 40000, 60000, 60000]);
    });
  });
});

describe('postJson', () => {
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  test('should POST a JSON body', async () => {
    fetchSpy.mockResolvedValue(new Response(null, { status: 200 }));

    await postJson('https://hooks.example.test/x', { text: 'hi' });

    expect(fetchSpy).toHaveBeenCalledWith('https://hooks.example.test/x', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text":"hi"}'
    });
  });

  test('should reject on a non-2xx response', async () => {
    fetchSpy.mockResolvedValue(new Response('no_service', { status: 404, statusText: 'Not Found' }));

    await expect(postJson('https://hooks.example.test/x', {})).rejects.toThrow('HTTP 404 Not Found');
  });
});
