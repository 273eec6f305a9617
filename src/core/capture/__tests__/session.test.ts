// src/core/capture/__tests__/session.test.ts
import { describe, it, expect, beforeEach } from '@jest/globals';
import { CaptureSession, isTerminal } from '../session.js';
import { fingerprint } from '../../dedupe/fingerprint.js';
import type { ExtractedImage } from '../../types/index.js';
import { dataUrl, pngBytes } from './helpers.js';

function image(tag: string): ExtractedImage {
  const bytes = pngBytes(tag);
  return {
    imageBytes: bytes,
    format: 'png',
    width: 1200,
    height: 1800,
    fingerprint: fingerprint(bytes),
    sourceKind: 'canvas',
  };
}

describe('CaptureSession', () => {
  let session: CaptureSession;

  beforeEach(() => {
    session = new CaptureSession('20261018');
  });

  describe('admit', () => {
    it('should assign contiguous indices from 1', () => {
      const first = session.admit(image('A'), 'https://cdn.test/a.png');
      const second = session.admit(image('B'), 'https://cdn.test/b.png');

      expect(first.status).toBe('captured');
      expect(second.status).toBe('captured');
      expect(session.getPages().map(p => p.sequenceIndex)).toEqual([1, 2]);
      expect(session.size).toBe(2);
    });

    it('should count a repeated fingerprint without using an index', () => {
      session.admit(image('A'), 'https://cdn.test/a.png');
      const outcome = session.admit(image('A'), 'https://cdn.test/a-again.png');
      session.admit(image('B'), 'https://cdn.test/b.png');

      expect(outcome).toEqual({ status: 'duplicate', sequenceIndex: 1 });
      expect(session.duplicateCount).toBe(1);
      expect(session.getPages().map(p => p.sequenceIndex)).toEqual([1, 2]);
    });

    it('should return frozen pages', () => {
      const outcome = session.admit(image('A'), 'https://cdn.test/a.png');
      if (outcome.status !== 'captured') throw new Error('expected a captured page');

      expect(Object.isFrozen(outcome.page)).toBe(true);
    });

    it('should reject pages after freeze', () => {
      session.admit(image('A'), 'https://cdn.test/a.png');
      const pages = session.freeze();

      expect(pages).toHaveLength(1);
      expect(session.isFrozen()).toBe(true);
      expect(() => session.admit(image('B'), 'https://cdn.test/b.png')).toThrow('Capture session is frozen');
    });
  });

  describe('source references', () => {
    it('should remember the fingerprint of an extracted reference', () => {
      const ref = dataUrl(pngBytes('A'));
      session.admit(image('A'), ref);

      expect(session.knownFingerprint(ref)).toBe(fingerprint(pngBytes('A')));
      expect(session.knownFingerprint('https://cdn.test/other.png')).toBeUndefined();
    });

    it('should track observed references', () => {
      session.markObserved('https://cdn.test/a.png');

      expect(session.hasObserved('https://cdn.test/a.png')).toBe(true);
      expect(session.hasObserved('https://cdn.test/b.png')).toBe(false);
    });

    it('should not keep inline payloads in the dropped report', () => {
      const ref = dataUrl(pngBytes('broken'));
      session.recordDrop(ref, 3, 'Corrupt base64 payload');

      expect(session.isDropped(ref)).toBe(true);
      expect(session.getDropped()).toEqual([{ sourceRef: 'data:', attempts: 3, reason: 'Corrupt base64 payload' }]);
    });
  });

  it('should record gaps after the last captured page', () => {
    session.admit(image('A'), 'https://cdn.test/a.png');
    session.recordGap(4);

    expect(session.getGaps()).toEqual([{ after: 1, attempts: 4 }]);
  });

  describe('transition', () => {
    it('should follow the driver lifecycle', () => {
      session.transition('probing');
      session.transition('retrying');
      session.transition('probing');
      session.transition('extracting');
      session.transition('advancing');
      session.transition('draining');
      session.transition('done');

      expect(session.state).toBe('done');
      expect(isTerminal(session.state)).toBe(true);
    });

    it('should reject illegal transitions', () => {
      expect(() => session.transition('extracting')).toThrow('Illegal driver transition: init -> extracting');
    });

    it('should not leave a terminal state', () => {
      session.transition('failed');

      expect(() => session.transition('probing')).toThrow('Illegal driver transition: failed -> probing');
    });
  });
});
