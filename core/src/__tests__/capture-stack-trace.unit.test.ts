import { describe, it, expect } from 'vitest';
import { captureStackTrace } from '../stack-trace.js';
import { MalformedChunkSequenceError, ValidationError } from '../errors.js';

describe('captureStackTrace', () => {
  it('leaves a stack on the error', () => {
    const error = new Error('test');
    captureStackTrace(error, Error);
    expect(typeof error.stack).toBe('string');
  });

  it('omits the constructor frame', () => {
    class TableGoneError extends Error {
      constructor() {
        super('gone');
        this.name = 'TableGoneError';
        captureStackTrace(this, TableGoneError);
      }
    }

    const stack = new TableGoneError().stack ?? '';
    expect(stack.startsWith('TableGoneError: gone')).toBe(true);
    expect(stack).not.toContain('new TableGoneError');
  });

  it('is applied by the library errors', () => {
    const error = ValidationError.invalidFilter('bad');
    expect(error.stack).toContain('ValidationError: Invalid row filter: bad');
    expect(new MalformedChunkSequenceError('x').stack).toContain('MalformedChunkSequenceError: x');
  });
});
