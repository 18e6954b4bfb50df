import { describe, it, expect } from 'vitest';
import { BadRequestException } from '@nestjs/common';
import { CreateJobInputSchema } from '@media-pipeline/shared';
import { parseBody } from '../parse-body';

describe('parseBody', () => {
  it('returns the parsed body', () => {
    expect(parseBody(CreateJobInputSchema, { key: ' uploads/a.jpg ' })).toEqual({
      key: 'uploads/a.jpg',
    });
  });

  it('reports every issue as a 400', () => {
    let caught: unknown;
    try {
      parseBody(CreateJobInputSchema, { key: '', pipeline: 'thumbnail' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BadRequestException);
    if (caught instanceof BadRequestException) {
      expect(caught.getResponse()).toEqual({
        error: 'Invalid request body',
        issues: ['key: key is required', 'pipeline: Expected array, received string'],
      });
    }
  });
});
