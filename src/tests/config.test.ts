import { describe, it, expect } from 'vitest';
import { parseConfig } from '../config';
import { ValidationError } from '../utils/errors';

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({})).toEqual({ logLevel: 'info', logDir: undefined, textGridBoundaryTolerance: 0 });
  });

  it('reads values from the environment', () => {
    expect(parseConfig({ LOG_LEVEL: 'debug', LOG_DIR: 'logs', TEXTGRID_BOUNDARY_TOLERANCE: '0.002' })).toEqual({
      logLevel: 'debug',
      logDir: 'logs',
      textGridBoundaryTolerance: 0.002,
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ LOG_LEVEL: 'loud' })).toThrow(ValidationError);
    expect(() => parseConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });

  it('rejects a negative tolerance', () => {
    expect(() => parseConfig({ TEXTGRID_BOUNDARY_TOLERANCE: '-1' })).toThrow(
      /^Invalid configuration: TEXTGRID_BOUNDARY_TOLERANCE: /
    );
  });
});
