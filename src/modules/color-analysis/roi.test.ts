import { describe, it, expect } from 'vitest';
import { thrownCode } from '../../testing/fixtures';
import { DEFAULT_ROI, normalizeRoi, roiPreset, roiToPixelRect } from './roi';

describe('roiPreset', () => {
  it('returns a fresh copy of the preset', () => {
    const preset = roiPreset('CENTER');
    expect(preset).toEqual({ left: 0.3, top: 0.3, right: 0.7, bottom: 0.7 });
    preset.left = 0;
    expect(roiPreset('CENTER').left).toBe(0.3);
  });

  it('defaults to the lower eyelid', () => {
    expect(DEFAULT_ROI).toEqual({ left: 0.15, top: 0.55, right: 0.85, bottom: 0.85 });
    expect(Object.isFrozen(DEFAULT_ROI)).toBe(true);
  });
});

describe('normalizeRoi', () => {
  it('clamps bounds into the unit square', () => {
    expect(normalizeRoi({ left: -0.2, top: 0.1, right: 1.4, bottom: 0.9 })).toEqual({
      left: 0,
      top: 0.1,
      right: 1,
      bottom: 0.9
    });
  });

  it('treats NaN bounds as zero', () => {
    expect(normalizeRoi({ left: Number.NaN, top: 0, right: 0.5, bottom: 0.5 }).left).toBe(0);
  });

  it('rejects regions without area', () => {
    expect(thrownCode(() => normalizeRoi({ left: 0.5, top: 0.2, right: 0.5, bottom: 0.8 }))).toBe('INVALID_ROI');
    expect(thrownCode(() => normalizeRoi({ left: 0.1, top: 0.9, right: 0.8, bottom: 0.3 }))).toBe('INVALID_ROI');
    expect(thrownCode(() => normalizeRoi({ left: 1.2, top: 0, right: 1.5, bottom: 1 }))).toBe('INVALID_ROI');
  });
});

describe('roiToPixelRect', () => {
  it('floors fractional bounds onto pixels', () => {
    expect(roiToPixelRect(DEFAULT_ROI, 100, 100)).toEqual({ x: 15, y: 55, width: 70, height: 30 });
  });

  it('keeps at least one pixel', () => {
    expect(roiToPixelRect({ left: 0.5, top: 0.5, right: 0.51, bottom: 0.51 }, 10, 10)).toEqual({
      x: 5,
      y: 5,
      width: 1,
      height: 1
    });
  });

  it('stays inside the frame at the far edge', () => {
    expect(roiToPixelRect({ left: 0.99, top: 0.99, right: 1, bottom: 1 }, 10, 10)).toEqual({
      x: 9,
      y: 9,
      width: 1,
      height: 1
    });
  });
});
