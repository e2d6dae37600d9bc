import { describe, it, expect } from 'vitest';
import { classifyEvent } from '../runtime/classifyEvent.js';
import { httpEvent } from './helpers.js';

describe('classifyEvent', () => {
  describe('function URL events', () => {
    it('classifies the $default stage as a function URL', () => {
      expect(classifyEvent({ requestContext: { stage: '$default' } })).toBe('function-url');
    });

    it('classifies an empty stage as a function URL', () => {
      expect(classifyEvent({ requestContext: { stage: '' } })).toBe('function-url');
    });

    it('classifies a missing stage as a function URL', () => {
      expect(classifyEvent({ requestContext: {} })).toBe('function-url');
    });

    it('classifies a full v2 payload without a custom stage', () => {
      expect(classifyEvent(httpEvent('/api/health', '$default'))).toBe('function-url');
    });
  });

  describe('API Gateway events', () => {
    it.each(['prod', 'staging', 'dev', 'default'])('classifies stage %s as API Gateway', (stage) => {
      expect(classifyEvent({ requestContext: { stage } })).toBe('api-gateway');
    });

    it('classifies a full v2 payload with a named stage', () => {
      expect(classifyEvent(httpEvent('/prod/api/health', 'prod'))).toBe('api-gateway');
    });
  });

  describe('malformed events', () => {
    it('treats an event without requestContext as a function URL', () => {
      expect(classifyEvent({})).toBe('function-url');
    });

    it('treats a null requestContext as a function URL', () => {
      expect(classifyEvent({ requestContext: null })).toBe('function-url');
    });

    it('treats a non-object requestContext as a function URL', () => {
      expect(classifyEvent({ requestContext: 'prod' })).toBe('function-url');
    });

    it('treats a non-string stage as a function URL', () => {
      expect(classifyEvent({ requestContext: { stage: 42 } })).toBe('function-url');
    });
  });

  it('leaves the event untouched', () => {
    const event = { requestContext: { stage: 'prod', requestId: 'abc' }, rawPath: '/prod/x' };
    const copy = structuredClone(event);

    classifyEvent(event);

    expect(event).toEqual(copy);
  });
});
