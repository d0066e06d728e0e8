export type StreamEvent =
  | { type: 'delta'; text: string }
  | { type: 'done'; text: string }
  | { type: 'error'; message: string }
  | { type: 'ignore' };

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseJsonObject = (payload: string): JsonObject | undefined => {
  try {
    const parsed: unknown = JSON.parse(payload);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
};

const readString = (object: JsonObject, key: string): string | undefined => {
  const value = object[key];
  return typeof value === 'string' ? value : undefined;
};

const searchNested = (value: unknown, keys: string[]): string | undefined => {
  if (isJsonObject(value)) {
    return extractString(value, keys);
  }

  if (Array.isArray(value)) {
    for (const item of value) {
      if (!isJsonObject(item)) {
        continue;
      }

      const found = extractString(item, keys);
      if (found) {
        return found;
      }
    }
  }

  return undefined;
};

/**
 * First non-empty string under any of `keys`, looking at the named fields first and then
 * through every nested object or array of objects.
 */
const extractString = (object: JsonObject, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = object[key];
    if (typeof value === 'string' && value) {
      return value;
    }

    const nested = searchNested(value, keys);
    if (nested) {
      return nested;
    }
  }

  for (const value of Object.values(object)) {
    const nested = searchNested(value, keys);
    if (nested) {
      return nested;
    }
  }

  return undefined;
};

/**
 * Normalizes one server-sent message. Streaming transports disagree on the discriminator
 * field (`type` or `event`) and on where text lives, so matching is by intent. An error
 * shape always wins over delta or completion shapes in the same payload.
 */
export const parseStreamEvent = (payload: string): StreamEvent => {
  const object = parseJsonObject(payload);
  if (!object) {
    return { type: 'ignore' };
  }

  const eventType = readString(object, 'type') ?? readString(object, 'event') ?? '';

  if (eventType === 'error') {
    return {
      type: 'error',
      message: extractString(object, ['message', 'error']) ?? 'Unknown streaming error'
    };
  }

  const errorObject = object.error;
  if (isJsonObject(errorObject)) {
    const message = readString(errorObject, 'message');
    if (message) {
      return { type: 'error', message };
    }
  }

  if (eventType.includes('delta')) {
    return { type: 'delta', text: extractString(object, ['delta', 'text']) ?? '' };
  }

  if (eventType.includes('done')) {
    return { type: 'done', text: extractString(object, ['text', 'transcript']) ?? '' };
  }

  const delta = extractString(object, ['delta']);
  if (delta) {
    return { type: 'delta', text: delta };
  }

  const text = extractString(object, ['text']);
  if (text) {
    return { type: 'done', text };
  }

  return { type: 'ignore' };
};

export type ServerSentLine =
  | { kind: 'payload'; payload: string }
  | { kind: 'terminator' }
  | { kind: 'blank' };

/** Strips the SSE `data:` prefix from one line of a streamed response body. */
export const readServerSentLine = (line: string): ServerSentLine => {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'blank' };
  }

  const payload = trimmed.startsWith('data:') ? trimmed.slice('data:'.length).trim() : trimmed;
  if (payload === '[DONE]') {
    return { kind: 'terminator' };
  }

  return payload ? { kind: 'payload', payload } : { kind: 'blank' };
};
