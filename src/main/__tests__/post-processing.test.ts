import { describe, expect, it } from 'vitest';
import { applyPostProcessing, toPostProcessingConfig, type PostProcessingConfig } from '../post-processing.js';

const none: PostProcessingConfig = { removeTrailingPeriod: false, addTrailingSpace: false, removeCapitalization: false };

describe('applyPostProcessing', () => {
  it('strips the period, then appends the space, then lowercases', () => {
    expect(
      applyPostProcessing('Hello.', { removeTrailingPeriod: true, addTrailingSpace: true, removeCapitalization: true })
    ).toBe('hello ');
  });

  it('always trims surrounding whitespace', () => {
    expect(applyPostProcessing('  Hello.  \n', none)).toBe('Hello.');
  });

  it('trims before looking for the trailing period', () => {
    expect(applyPostProcessing('End.   ', { ...none, removeTrailingPeriod: true, addTrailingSpace: true })).toBe('End ');
  });

  it('drops only a single trailing period', () => {
    expect(applyPostProcessing('Wait...', { ...none, removeTrailingPeriod: true })).toBe('Wait..');
  });

  it('leaves other trailing punctuation alone', () => {
    expect(applyPostProcessing('Really?', { ...none, removeTrailingPeriod: true })).toBe('Really?');
  });

  it('lowercases the whole string when asked', () => {
    expect(applyPostProcessing('Open The DOOR', { ...none, removeCapitalization: true })).toBe('open the door');
  });

  it('maps config keys onto flags', () => {
    expect(
      toPostProcessingConfig({ remove_trailing_period: true, add_trailing_space: false, remove_capitalization: true })
    ).toEqual({ removeTrailingPeriod: true, addTrailingSpace: false, removeCapitalization: true });
  });
});
