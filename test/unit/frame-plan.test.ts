/**
 * Unit tests for frame pass ordering.
 */

import { describe, it, expect } from 'vitest';
import { planFrame, passLabel } from '../../src/frame-plan';

describe('planFrame', () => {
  it('orders screen, temporal, then ambient for both views', () => {
    expect(planFrame().map(passLabel)).toEqual([
      'screen:0',
      'screen:1',
      'temporal:0',
      'temporal:1',
      'ambient',
    ]);
  });

  it('skips both passes of a skipped view', () => {
    expect(planFrame({ views: [0] }).map(passLabel)).toEqual(['screen:0', 'temporal:0', 'ambient']);
  });

  it('skips the ambient pass when view 0 is skipped', () => {
    expect(planFrame({ views: [1] }).map(passLabel)).toEqual(['screen:1', 'temporal:1']);
  });

  it('skips the ambient pass when disabled', () => {
    expect(planFrame({ ambient: false }).map(passLabel)).toEqual([
      'screen:0',
      'screen:1',
      'temporal:0',
      'temporal:1',
    ]);
  });

  it('de-duplicates and sorts requested views', () => {
    expect(planFrame({ views: [1, 0, 1], ambient: false }).map(passLabel)).toEqual([
      'screen:0',
      'screen:1',
      'temporal:0',
      'temporal:1',
    ]);
  });

  it('is empty when no view is requested', () => {
    expect(planFrame({ views: [] })).toEqual([]);
  });
});
