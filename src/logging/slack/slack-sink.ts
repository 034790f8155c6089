/**
 * Slack sink
 *
 * Posts each line to the SLACK_WEBHOOK_URL incoming webhook. Failed posts
 * wait in a bounded queue (oldest dropped first) and are retried with a
 * doubling delay capped at 60s. Slack failures never reach the controller.
 */

import type { TimerAPI } from '$types';
import type { PostJsonFn, SinkStatus, SlackSink, SlackSinkConfig } from '../types';

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

/**
 * POST a JSON body with the global fetch
 * @param url - Target URL
 * @param body - Value serialized as JSON
 * @throws {Error} On network failure or a non-2xx response
 */
export async function postJson(url: string, body: unknown): Promise<void> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });

  if (!response.ok) {
    throw new Error('HTTP ' + response.status + ' ' + response.statusText);
  }
}

/**
 * Create a Slack sink with buffering and retry
 *
 * Failed messages are buffered and retried with exponential backoff.
 * Nothing is sent until start() accepts the webhook URL.
 *
 * @param post - JSON poster (postJson in production)
 * @param timerApi - Timer API for retry scheduling
 * @param config - Slack sink configuration
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(postJson, createNodeTimer({ unref: true }), {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL ?? '',
 *   bufferSize: 10,
 *   retryDelayMs: 1000,
 *   maxRetries: 5
 * });
 *
 * const status = slackSink.start();
 * if (!status.ok) console.warn(status.message);
 * ```
 */
export function createSlackSink(
  post: PostJsonFn,
  timerApi: TimerAPI,
  config: SlackSinkConfig
): SlackSink {
  let webhookUrl: string | null = null;
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;

  /**
   * Send a message to Slack
   * @param message - Message to send
   * @param onSuccess - Called on success
   * @param onFailure - Called on failure
   */
  function sendToSlack(
    message: BufferedMessage,
    onSuccess: () => void,
    onFailure: () => void
  ): void {
    if (!webhookUrl) {
      onFailure();
      return;
    }

    let pending: Promise<void>;
    try {
      pending = post(webhookUrl, { text: message.text });
    } catch (err) {
      console.warn('Slack send exception: ' + String(err));
      onFailure();
      return;
    }

    pending.then(
      onSuccess,
      function(err: unknown) {
        console.warn('Slack send failed: ' + (err instanceof Error ? err.message : String(err)));
        onFailure();
      }
    ).catch(function(err: unknown) {
      console.warn('Slack sink error: ' + String(err));
    });
  }

  /**
   * Process the retry buffer
   * Attempts to send the first message, schedules retry on failure
   */
  function processBuffer(): void {
    if (buffer.length === 0) {
      retryTimerActive = false;
      currentRetryDelay = config.retryDelayMs;
      return;
    }

    const message = buffer[0];

    sendToSlack(
      message,
      function onSuccess() {
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;

        if (buffer.length > 0) {
          processBuffer();
        } else {
          retryTimerActive = false;
        }
      },
      function onFailure() {
        message.retries++;

        if (message.retries >= config.maxRetries) {
          console.warn('Slack message dropped after ' + config.maxRetries + ' retries');
          buffer.shift();
          currentRetryDelay = config.retryDelayMs;
        } else {
          currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
        }

        if (buffer.length > 0) {
          timerApi.set(currentRetryDelay, false, processBuffer);
        } else {
          retryTimerActive = false;
        }
      }
    );
  }

  /**
   * Initialize the sink by checking the webhook URL
   * @param callback - Called with (success, message)
   */
  function start(): SinkStatus {
    if (!config.enabled) {
      return { ok: true, message: 'Slack disabled' };
    }

    if (!/^https?:\/\//.test(config.webhookUrl)) {
      return { ok: false, message: 'Slack enabled but SLACK_WEBHOOK_URL is not set' };
    }

    webhookUrl = config.webhookUrl;
    return { ok: true, message: 'Slack webhook configured' };
  }

  /**
   * Write formatted message to Slack
   * Messages are sent immediately if possible, or buffered for retry
   * @param formattedMessage - Pre-formatted log message (already filtered by level)
   */
  function write(formattedMessage: string): void {
    if (!config.enabled || !webhookUrl) {
      return;
    }

    const message: BufferedMessage = {
      text: formattedMessage,
      retries: 0
    };

    sendToSlack(
      message,
      function onSuccess() {
        // Sent, nothing to retry
      },
      function onFailure() {
        if (buffer.length >= config.bufferSize) {
          const dropped = buffer.shift();
          console.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
        }
        buffer.push(message);

        if (!retryTimerActive) {
          retryTimerActive = true;
          timerApi.set(currentRetryDelay, false, processBuffer);
        }
      }
    );
  }

  return {
    write: write,
    start: start
  };
}
