import {
  DeclarationError,
  TracegenError,
  configurationError,
  createTypedError,
  duplicateTracepointError,
  errorDomain,
  generationError,
  invocationError,
  missingOptionError,
  writeFailedError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'CONFIG.TEST',
      message: 'test error',
      tracepoint: 'start_blit',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('CONFIG.TEST');
    expect(error.tracepoint).toBe('start_blit');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('factories namespace their codes', () => {
    expect(configurationError('INVALID_NAME', 'bad').code).toBe('CONFIG.INVALID_NAME');
    expect(invocationError('UNKNOWN_OPTION', 'bad').code).toBe('INVOCATION.UNKNOWN_OPTION');
    expect(generationError('bad').code).toBe('GENERATION.FAILED');
    expect(writeFailedError('out.h', 'EACCES').message).toBe('Failed to write out.h: EACCES');
  });

  test('errorDomain reads the code prefix', () => {
    expect(errorDomain(missingOptionError('--utrace-src'))).toBe('INVOCATION');
    expect(errorDomain(duplicateTracepointError('end_blit'))).toBe('CONFIG');
    expect(errorDomain(createTypedError({ code: 'OTHER.X', message: '' }))).toBeUndefined();
  });

  test('duplicate tracepoint error names the tracepoint and suggests a rename', () => {
    const error = duplicateTracepointError('end_blit');
    expect(error.message).toBe('Tracepoint already registered: end_blit');
    expect(error.tracepoint).toBe('end_blit');
    expect(error.suggestedFixes[0].type).toBe('RENAME');
  });
});

describe('DeclarationError', () => {
  test('carries every error and summarizes the count', () => {
    const err = new DeclarationError([
      configurationError('INVALID_NAME', 'first'),
      configurationError('MISSING_FIELD', 'second'),
      configurationError('MISSING_FIELD', 'third'),
    ]);
    expect(err).toBeInstanceOf(TracegenError);
    expect(err.name).toBe('DeclarationError');
    expect(err.message).toBe('first (and 2 more)');
    expect(err.typedError.message).toBe('first');
    expect(err.errors).toHaveLength(3);
  });

  test('uses the single message as is', () => {
    expect(new DeclarationError([configurationError('INVALID_NAME', 'only')]).message).toBe('only');
  });
});
