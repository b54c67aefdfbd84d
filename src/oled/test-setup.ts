/**
 * Property-Based Testing Setup for the LUNA display
 *
 * Common generators and validators shared by the property tests.
 */

import * as fc from 'fast-check';
import type { Frame, Snapshot } from './types/index.js';

export const snapshotArbitrary: fc.Arbitrary<Snapshot> = fc.record({
  ip: fc.oneof(fc.ipV4(), fc.constant('N/A')),
  cpuPercent: fc.integer({ min: 0, max: 100 }),
  ramPercent: fc.integer({ min: 0, max: 100 }),
});

/** Local wall-clock times across several decades */
export const wallClockArbitrary: fc.Arbitrary<Date> = fc.date({
  min: new Date(2000, 0, 1),
  max: new Date(2099, 11, 31),
  noInvalidDate: true,
});

export const wordArbitrary: fc.Arbitrary<string> = fc.stringMatching(/^[A-Za-z0-9.,!?']{1,12}$/);

/** Space separated words, as a model reply would read */
export const messageArbitrary: fc.Arbitrary<string> = fc
  .array(wordArbitrary, { minLength: 1, maxLength: 12 })
  .map(words => words.join(' '));

/** Messages that take the marquee path */
export const longMessageArbitrary: fc.Arbitrary<string> = fc.string({ minLength: 26, maxLength: 160 });

/** Messages that take the word-wrap path */
export const shortMessageArbitrary: fc.Arbitrary<string> = messageArbitrary.filter(message => message.length <= 25);

/**
 * Checks the frame stays inside the panel's text area
 */
export function validateFrame(frame: Frame): boolean {
  return (
    frame.length <= 5 &&
    frame.every(line => line.x === 0 && line.y >= 0 && line.y <= 60)
  );
}

export const propertyTestConfig = {
  numRuns: 100,
};
