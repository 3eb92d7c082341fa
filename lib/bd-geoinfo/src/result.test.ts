import { describe, it, expect } from 'vitest';
import { ok, err, isOk, isErr, unwrap, unwrapOr, map, match, tryCatchSync } from './result.js';
import { GeoNotFoundError } from './errors.js';
import type { Result } from './result.js';

describe('Result', () => {
  it('narrows with isOk and isErr', () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(err('x'))).toBe(true);
    expect(isOk(err('x'))).toBe(false);
  });

  it('unwraps values and rethrows errors', () => {
    const notFound = new GeoNotFoundError('district', 'Gotham');

    expect(unwrap(ok('Sylhet'))).toBe('Sylhet');
    expect(() => unwrap(err(notFound))).toThrow(notFound);
    expect(unwrapOr(err(notFound), 'fallback')).toBe('fallback');
  });

  it('maps only successful results', () => {
    expect(map(ok(2), n => n * 2)).toEqual({ ok: true, value: 4 });
    expect(map(err<string>('no'), (n: number) => n * 2)).toEqual({ ok: false, error: 'no' });
  });

  it('matches both branches', () => {
    const label = (r: Result<number, string>) =>
      match(r, { ok: v => `value ${v}`, err: e => `error ${e}` });

    expect(label(ok(1))).toBe('value 1');
    expect(label(err('boom'))).toBe('error boom');
  });

  it('captures thrown errors', () => {
    const result = tryCatchSync(
      (): unknown => JSON.parse('{'),
      e => (e instanceof SyntaxError ? 'syntax' : 'other')
    );

    expect(result).toEqual({ ok: false, error: 'syntax' });
  });
});

describe('GeoNotFoundError', () => {
  it('serializes its code and details', () => {
    expect(new GeoNotFoundError('union', 'Nowhere').toJSON()).toEqual({
      name: 'GeoNotFoundError',
      message: 'No union matches "Nowhere"',
      code: 'NOT_FOUND',
      details: { kind: 'union', query: 'Nowhere' },
    });
  });
});
