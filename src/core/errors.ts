export type TranscriptionFailure =
  | { kind: 'audioFileNotReady' }
  | { kind: 'fileTooLarge' }
  | { kind: 'unauthorized' }
  | { kind: 'network'; reason: string }
  | { kind: 'timeout' }
  | { kind: 'server'; status: number; message: string }
  | { kind: 'invalidResponse' }
  | { kind: 'emptyText' };

export const describeFailure = (failure: TranscriptionFailure): string => {
  switch (failure.kind) {
    case 'audioFileNotReady':
      return 'Audio file is not ready yet. Try again in a moment.';
    case 'fileTooLarge':
      return 'Recording is too long (over the 25 MB upload limit).';
    case 'unauthorized':
      return 'API key is invalid or unauthorized (401).';
    case 'network':
      return `Network error: ${failure.reason}`;
    case 'timeout':
      return 'Request timed out. Check the network connection and retry.';
    case 'server':
      return `Server error (${failure.status}): ${failure.message}`;
    case 'invalidResponse':
      return 'Server response could not be parsed.';
    case 'emptyText':
      return 'No speech was recognized.';
  }
};

export class TranscriptionError extends Error {
  public constructor(public readonly failure: TranscriptionFailure) {
    super(describeFailure(failure));
    this.name = 'TranscriptionError';
  }
}

/** The enclosing session abandoned the call. Not a user-facing error. */
export class TranscriptionCancelledError extends Error {
  public constructor() {
    super('Transcription cancelled');
    this.name = 'TranscriptionCancelledError';
  }
}

export class MicrophonePermissionError extends Error {
  public constructor(detail = 'Microphone access was not granted.') {
    super(detail);
    this.name = 'MicrophonePermissionError';
  }
}

export class MissingApiKeyError extends Error {
  public constructor() {
    super('No API key configured. Set OPENAI_API_KEY or PUSHSCRIBE_API_KEY.');
    this.name = 'MissingApiKeyError';
  }
}

/** Whether a different request shape (plain instead of streamed) could still succeed. */
export const isRecoverableFailure = (failure: TranscriptionFailure): boolean => {
  switch (failure.kind) {
    case 'timeout':
    case 'network':
    case 'invalidResponse':
      return true;
    case 'server':
      return failure.status === 408 || failure.status === 429 || failure.status >= 500;
    default:
      return false;
  }
};
