import fs from 'node:fs/promises';
import path from 'node:path';
import {
  isRecoverableFailure,
  TranscriptionCancelledError,
  TranscriptionError,
  type TranscriptionFailure
} from '../../core/errors';
import type { RemoteTranscriber, RemoteTranscriptionRequest } from '../../core/TranscriptionCoordinator';
import { parseStreamEvent, readServerSentLine } from '../../core/TranscriptionStreamEventParser';
import type { StructuredLogger } from '../../logging/StructuredLogger';

export interface OpenAITranscribeClientOptions {
  baseUrl?: string;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

const MAX_FILE_BYTES = 25 * 1024 * 1024;
const KEEP_WARM_INTERVAL_MS = 20000;
const KEEP_WARM_TIMEOUT_MS = 5000;

const MIME_TYPES: Record<string, string> = {
  m4a: 'audio/mp4',
  mp3: 'audio/mpeg',
  mpga: 'audio/mpeg',
  mp4: 'audio/mp4',
  mpeg: 'audio/mp4',
  webm: 'audio/webm',
  wav: 'audio/wav',
  flac: 'audio/flac',
  ogg: 'audio/ogg'
};

const mimeTypeFor = (filePath: string): string =>
  MIME_TYPES[path.extname(filePath).slice(1).toLowerCase()] ?? 'application/octet-stream';

const parseErrorMessage = (body: string): string | undefined => {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed !== 'object' || parsed === null) {
      return undefined;
    }

    if ('error' in parsed && typeof parsed.error === 'object' && parsed.error !== null) {
      const nested = parsed.error;
      if ('message' in nested && typeof nested.message === 'string') {
        return nested.message;
      }
    }

    if ('message' in parsed && typeof parsed.message === 'string') {
      return parsed.message;
    }

    return undefined;
  } catch {
    return undefined;
  }
};

const fail = (failure: TranscriptionFailure): TranscriptionError => new TranscriptionError(failure);

const networkReason = (error: unknown): string => {
  if (error instanceof Error) {
    const cause: unknown = error.cause;
    return cause instanceof Error ? cause.message : error.message;
  }

  return String(error);
};

interface RequestScope {
  signal: AbortSignal;
  /** Maps whatever the request threw onto a transcription failure. */
  translate: (error: unknown) => Error;
  close: () => void;
}

/**
 * Client for the OpenAI `/audio/transcriptions` endpoint. Streams first so the HUD can show
 * partial text, and repeats the upload once as a plain text request when streaming fails in a
 * way a plain request could survive.
 */
export class OpenAITranscribeClient implements RemoteTranscriber {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private lastWarmAt: number | undefined;

  public constructor(
    options: OpenAITranscribeClientOptions = {},
    private readonly logger?: StructuredLogger
  ) {
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? 45000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => Date.now());
  }

  public async transcribe(request: RemoteTranscriptionRequest): Promise<string> {
    try {
      return await this.transcribeStreaming(request);
    } catch (error) {
      if (!(error instanceof TranscriptionError) || !isRecoverableFailure(error.failure)) {
        throw error;
      }

      this.logger?.warn('Streaming transcription failed; retrying without streaming', {
        detail: error.message
      });
      return this.transcribePlain(request);
    }
  }

  /** Opens the TLS connection ahead of the upload. Fire-and-forget, throttled. */
  public keepWarm(): void {
    const now = this.now();
    if (this.lastWarmAt !== undefined && now - this.lastWarmAt < KEEP_WARM_INTERVAL_MS) {
      return;
    }

    this.lastWarmAt = now;
    this.fetchImpl(this.endpoint(), { method: 'HEAD', signal: AbortSignal.timeout(KEEP_WARM_TIMEOUT_MS) })
      .then((response) => {
        this.logger?.debug('Connection prewarmed', { status: response.status });
      })
      .catch((error: unknown) => {
        this.logger?.debug('Connection prewarm failed', { detail: networkReason(error) });
      });
  }

  public async transcribeStreaming(request: RemoteTranscriptionRequest): Promise<string> {
    const form = await this.buildForm(request, true);
    const scope = this.openScope(request.signal);

    try {
      const response = await this.post(form, request.apiKey, scope.signal);
      await this.rejectUnsuccessful(response);

      if (!response.body) {
        throw fail({ kind: 'invalidResponse' });
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffered = '';
      let aggregated = '';

      const consume = (line: string): string | undefined => {
        const parsedLine = readServerSentLine(line);
        if (parsedLine.kind === 'terminator') {
          return aggregated.trim();
        }

        if (parsedLine.kind === 'blank') {
          return undefined;
        }

        const event = parseStreamEvent(parsedLine.payload);
        switch (event.type) {
          case 'delta':
            if (event.text) {
              aggregated += event.text;
              request.onDelta?.(aggregated);
            }
            return undefined;
          case 'done': {
            const final = event.text.trim();
            return final ? final : undefined;
          }
          case 'error':
            throw fail({ kind: 'server', status: response.status, message: event.message });
          case 'ignore':
            return undefined;
        }
      };

      for (;;) {
        const { done, value } = await reader.read();
        buffered += done ? decoder.decode() : decoder.decode(value, { stream: true });

        let newlineIndex = buffered.indexOf('\n');
        while (newlineIndex >= 0) {
          const line = buffered.slice(0, newlineIndex);
          buffered = buffered.slice(newlineIndex + 1);
          const result = consume(line);
          if (result !== undefined) {
            return this.finish(result);
          }
          newlineIndex = buffered.indexOf('\n');
        }

        if (done) {
          break;
        }
      }

      const trailing = consume(buffered);
      return this.finish(trailing ?? aggregated.trim());
    } catch (error) {
      throw scope.translate(error);
    } finally {
      scope.close();
    }
  }

  public async transcribePlain(request: RemoteTranscriptionRequest): Promise<string> {
    const form = await this.buildForm(request, false);
    const scope = this.openScope(request.signal);

    try {
      const response = await this.post(form, request.apiKey, scope.signal);
      await this.rejectUnsuccessful(response);
      return this.finish((await response.text()).trim());
    } catch (error) {
      throw scope.translate(error);
    } finally {
      scope.close();
    }
  }

  private endpoint(): string {
    return `${this.baseUrl}/audio/transcriptions`;
  }

  private finish(text: string): string {
    if (!text) {
      throw fail({ kind: 'emptyText' });
    }

    return text;
  }

  private async buildForm(request: RemoteTranscriptionRequest, streaming: boolean): Promise<FormData> {
    const stats = await fs.stat(request.filePath);
    if (stats.size > MAX_FILE_BYTES) {
      throw fail({ kind: 'fileTooLarge' });
    }

    const audio = await fs.readFile(request.filePath);
    const form = new FormData();
    form.append('model', request.model);
    form.append('response_format', streaming ? 'json' : 'text');

    if (streaming) {
      form.append('stream', 'true');
    }

    if (request.languageCode) {
      form.append('language', request.languageCode);
    }

    if (request.prompt?.trim()) {
      form.append('prompt', request.prompt);
    }

    form.append('file', new Blob([audio], { type: mimeTypeFor(request.filePath) }), path.basename(request.filePath));
    return form;
  }

  private post(form: FormData, apiKey: string, signal: AbortSignal): Promise<Response> {
    return this.fetchImpl(this.endpoint(), {
      method: 'POST',
      headers: { Authorization: `Bearer ${apiKey}` },
      body: form,
      signal
    });
  }

  private async rejectUnsuccessful(response: Response): Promise<void> {
    if (response.ok) {
      return;
    }

    const body = await response.text();
    if (response.status === 401) {
      throw fail({ kind: 'unauthorized' });
    }

    if (response.status === 413) {
      throw fail({ kind: 'fileTooLarge' });
    }

    throw fail({
      kind: 'server',
      status: response.status,
      message: parseErrorMessage(body) ?? 'Unknown server error'
    });
  }

  private openScope(callerSignal?: AbortSignal): RequestScope {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);

    const onCallerAbort = (): void => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    return {
      signal: controller.signal,
      translate: (error) => {
        if (callerSignal?.aborted) {
          return new TranscriptionCancelledError();
        }

        if (timedOut) {
          return fail({ kind: 'timeout' });
        }

        if (error instanceof TranscriptionError) {
          return error;
        }

        return fail({ kind: 'network', reason: networkReason(error) });
      },
      close: () => {
        clearTimeout(timer);
        callerSignal?.removeEventListener('abort', onCallerAbort);
        // Releases a response body that was not read to the end.
        controller.abort();
      }
    };
  }
}
