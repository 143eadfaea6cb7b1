/**
 * Basic setup test to verify TypeScript and Jest configuration
 */

import * as fc from 'fast-check';
import { TrackValidator, QueueEntry } from '../index';

describe('Project Setup', () => {
  test('TypeScript compilation works', () => {
    expect(typeof TrackValidator).toBe('function');
    expect(typeof QueueEntry).toBe('function');
  });

  test('Jest and fast-check are available', () => {
    expect(fc).toBeDefined();
    expect(fc.assert).toBeDefined();
    expect(fc.property).toBeDefined();
  });
});
