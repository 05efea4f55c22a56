import { describe, expect, it } from 'vitest';
import { TransformerError } from '../src/index.js';

describe('TransformerError', () => {
  it('formats an actionable message with the suggestion', () => {
    const error = new TransformerError({
      code: 'UNKNOWN_FIELD',
      message: 'Unknown key: nope',
      suggestion: 'Known keys: id, name',
    });

    expect(error.toActionableMessage()).toBe(
      'Error [UNKNOWN_FIELD]: Unknown key: nope\nSuggested action: Known keys: id, name'
    );
  });

  it('serializes code, message and context', () => {
    const error = new TransformerError({
      code: 'INVALID_DIRECTION',
      message: 'Unknown direction: sideways',
      context: { direction: 'sideways' },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TransformerError');
    expect(error.toJSON()).toEqual({
      name: 'TransformerError',
      code: 'INVALID_DIRECTION',
      message: 'Unknown direction: sideways',
      suggestion: undefined,
      context: { direction: 'sideways' },
    });
  });

  it('keeps the wrapped cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = new TransformerError({ code: 'CONVERSION_FAILED', message: 'bad json', cause });

    expect(error.cause).toBe(cause);
  });
});
