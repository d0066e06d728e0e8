import { describe, expect, it } from 'vitest';
import { parseStreamEvent, readServerSentLine } from './TranscriptionStreamEventParser';

describe('parseStreamEvent', () => {
  it('parses a typed delta event', () => {
    expect(parseStreamEvent('{"type":"response.delta","delta":"你好"}')).toEqual({
      type: 'delta',
      text: '你好'
    });
  });

  it('parses a completion announced under the event field', () => {
    expect(parseStreamEvent('{"event":"transcript.done","text":"final text"}')).toEqual({
      type: 'done',
      text: 'final text'
    });
  });

  it('reads a completion transcript when text is absent', () => {
    expect(parseStreamEvent('{"type":"transcript.text.done","transcript":"all of it"}')).toEqual({
      type: 'done',
      text: 'all of it'
    });
  });

  it('extracts a nested error message', () => {
    expect(parseStreamEvent('{"type":"error","error":{"message":"quota exceeded"}}')).toEqual({
      type: 'error',
      message: 'quota exceeded'
    });
  });

  it('classifies an error event without a message', () => {
    expect(parseStreamEvent('{"type":"error"}')).toEqual({
      type: 'error',
      message: 'Unknown streaming error'
    });
  });

  it('lets an error object win over a delta shape', () => {
    expect(
      parseStreamEvent('{"type":"transcript.text.delta","delta":"partial","error":{"message":"boom"}}')
    ).toEqual({ type: 'error', message: 'boom' });
  });

  it('returns an empty delta when a delta event carries no text', () => {
    expect(parseStreamEvent('{"type":"transcript.text.delta"}')).toEqual({ type: 'delta', text: '' });
  });

  it('finds delta text nested inside arrays', () => {
    expect(parseStreamEvent('{"type":"response.delta","choices":[{"delta":"ab"}]}')).toEqual({
      type: 'delta',
      text: 'ab'
    });
  });

  it('falls back to untyped delta and text fields', () => {
    expect(parseStreamEvent('{"delta":"more"}')).toEqual({ type: 'delta', text: 'more' });
    expect(parseStreamEvent('{"text":"whole"}')).toEqual({ type: 'done', text: 'whole' });
  });

  it('ignores invalid and irrelevant payloads', () => {
    expect(parseStreamEvent('not-json')).toEqual({ type: 'ignore' });
    expect(parseStreamEvent('[1,2,3]')).toEqual({ type: 'ignore' });
    expect(parseStreamEvent('{"type":"session.created"}')).toEqual({ type: 'ignore' });
  });
});

describe('readServerSentLine', () => {
  it('strips the data prefix', () => {
    expect(readServerSentLine('data: {"delta":"x"}')).toEqual({ kind: 'payload', payload: '{"delta":"x"}' });
  });

  it('recognizes the terminator and blank lines', () => {
    expect(readServerSentLine('data: [DONE]')).toEqual({ kind: 'terminator' });
    expect(readServerSentLine('   ')).toEqual({ kind: 'blank' });
    expect(readServerSentLine('data:')).toEqual({ kind: 'blank' });
  });

  it('passes through lines without a prefix', () => {
    expect(readServerSentLine('{"text":"plain"}')).toEqual({ kind: 'payload', payload: '{"text":"plain"}' });
  });
});
