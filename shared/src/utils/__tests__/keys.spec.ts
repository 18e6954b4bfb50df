import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { canonicalParams, keyStem, outputKeyPrefix, uploadKeyFor } from '../keys';
import { StepName } from '../../enums';

describe('outputKeyPrefix', () => {
  it('is deterministic and independent of param order', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }),
        fc.dictionary(fc.string({ minLength: 1 }), fc.integer()),
        (inputKey, params) => {
          const reversed = Object.fromEntries(Object.entries(params).reverse());
          expect(outputKeyPrefix(inputKey, StepName.THUMBNAIL, params)).toBe(
            outputKeyPrefix(inputKey, StepName.THUMBNAIL, reversed)
          );
        }
      )
    );
  });

  it('differs by step name', () => {
    const a = outputKeyPrefix('uploads/x.jpg', StepName.THUMBNAIL, {});
    const b = outputKeyPrefix('uploads/x.jpg', StepName.WATERMARK, {});
    expect(a).not.toBe(b);
    expect(a).toMatch(/^outputs\/x\/thumbnail-[0-9a-f]{16}$/);
    expect(b).toMatch(/^outputs\/x\/watermark-[0-9a-f]{16}$/);
  });
});

describe('canonicalParams', () => {
  it('sorts keys', () => {
    expect(canonicalParams({ b: 1, a: 'x' })).toBe('{"a":"x","b":1}');
  });
});

describe('keyStem', () => {
  it('drops the directory and the last extension', () => {
    expect(keyStem('uploads/abc_clip.final.mp4')).toBe('abc_clip.final');
  });
});

describe('uploadKeyFor', () => {
  it('namespaces the basename under uploads/ with a dashless uuid', () => {
    const key = uploadKeyFor(
      '../../etc/holiday.jpg',
      () => '123e4567-e89b-12d3-a456-426614174000'
    );
    expect(key).toBe('uploads/123e4567e89b12d3a456426614174000_holiday.jpg');
  });

  it('handles windows-style paths', () => {
    expect(uploadKeyFor('C:\\Users\\me\\clip.mp4', () => 'u-1')).toBe(
      'uploads/u1_clip.mp4'
    );
  });
});
