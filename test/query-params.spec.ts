import { BadRequestException } from '@nestjs/common';
import { parseDateParam, parseIntegerParam } from '../src/common/http/query-params';

describe('parseDateParam', () => {
  it('accepts ISO-8601 dates and date-times', () => {
    expect(parseDateParam('2024-01-02T03:04:05.000Z', 'since')?.toISOString()).toBe(
      '2024-01-02T03:04:05.000Z'
    );
    expect(parseDateParam('2024-01-02T05:04:05+02:00', 'since')?.toISOString()).toBe(
      '2024-01-02T03:04:05.000Z'
    );
    expect(parseDateParam('2024-01-02', 'since')?.toISOString()).toBe('2024-01-02T00:00:00.000Z');
  });

  it('treats absent and blank values as no bound', () => {
    expect(parseDateParam(undefined, 'since')).toBeUndefined();
    expect(parseDateParam('  ', 'since')).toBeUndefined();
  });

  it.each(['1', '2024', 'yesterday', 'Tue Jan 02 2024', '2024/01/02', '2024-13-45'])(
    'rejects %p',
    (raw) => {
      expect(() => parseDateParam(raw, 'until')).toThrow(
        new BadRequestException('Invalid until timestamp')
      );
    }
  );

  it('rejects repeated values', () => {
    expect(() => parseDateParam(['2024-01-02', '2024-01-03'], 'since')).toThrow(
      'Multiple values provided for since'
    );
  });
});

describe('parseIntegerParam', () => {
  it('falls back to the default when absent', () => {
    expect(parseIntegerParam(undefined, 'limit', { min: 1, max: 10 }, 5)).toBe(5);
  });

  it('enforces integer syntax and bounds', () => {
    expect(parseIntegerParam('7', 'limit', { min: 1, max: 10 })).toBe(7);
    expect(() => parseIntegerParam('7.5', 'limit', { min: 1 })).toThrow('limit must be an integer');
    expect(() => parseIntegerParam('11', 'limit', { min: 1, max: 10 })).toThrow('limit must be 1..10');
  });
});
