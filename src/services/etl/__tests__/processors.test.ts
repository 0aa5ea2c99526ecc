import { describe, it, expect, jest } from '@jest/globals';
import { JobProcessor, MAX_STREAM_WAIT_SECONDS, readCount } from '../processors';
import { ConfigurationError, UnsupportedSourceTypeError } from '../../../utils/errors';

describe('JobProcessor', () => {
  const processor = new JobProcessor({ wait: async () => undefined });

  it('uses the per-source defaults when configuration is empty', () => {
    expect(processor.plan('database', {})).toEqual({ records: 1000, waitSeconds: 2 });
    expect(processor.plan('api', {})).toEqual({ records: 500, waitSeconds: 1.5 });
    expect(processor.plan('file', {})).toEqual({ records: 5000, waitSeconds: 3 });
    expect(processor.plan('stream', {})).toEqual({ records: 1000, waitSeconds: MAX_STREAM_WAIT_SECONDS });
  });

  it('reads the configured counts', () => {
    expect(processor.plan('database', { batch_size: 250 }).records).toBe(250);
    expect(processor.plan('api', { page_size: 20, pages: 3 }).records).toBe(60);
    expect(processor.plan('file', { estimated_records: '42' }).records).toBe(42);
  });

  it('multiplies duration by rate for streams and keeps short waits unclamped', () => {
    expect(processor.plan('stream', { duration_seconds: 3, records_per_second: 50 })).toEqual({
      records: 150,
      waitSeconds: 3,
    });
  });

  it('clamps the stream wait but not its record count', () => {
    expect(processor.plan('stream', { duration_seconds: 60, records_per_second: 2 })).toEqual({
      records: 120,
      waitSeconds: 5,
    });
  });

  it('floors fractional record counts', () => {
    expect(processor.plan('api', { page_size: 2.5, pages: 3 }).records).toBe(7);
  });

  it('rejects configured counts whose product is not a safe integer', () => {
    expect(() => processor.plan('api', { page_size: 1e200, pages: 1e200 })).toThrow(ConfigurationError);
    expect(() => processor.plan('api', { page_size: 1e200, pages: 1e200 })).toThrow(
      'Record count for api source is out of range: Infinity'
    );
    expect(() => processor.plan('stream', { duration_seconds: 2 ** 40, records_per_second: 2 ** 20 })).toThrow(
      ConfigurationError
    );
    expect(processor.plan('database', { batch_size: Number.MAX_SAFE_INTEGER }).records).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('rejects unknown source types', () => {
    expect(() => processor.plan('ftp', {})).toThrow(UnsupportedSourceTypeError);
    expect(() => processor.plan('ftp', {})).toThrow('Unsupported data source type: ftp');
  });

  it('waits for the simulated duration scaled by the simulation scale', async () => {
    const wait = jest.fn(async (ms: number) => {
      expect(ms).toBeGreaterThanOrEqual(0);
    });
    const scaled = new JobProcessor({ wait, simulationScale: 0.5 });

    await expect(scaled.process('database', { batch_size: 10 })).resolves.toBe(10);
    expect(wait).toHaveBeenCalledWith(1000);
  });
});

describe('readCount', () => {
  it('falls back when the key is absent or null', () => {
    expect(readCount({}, 'pages', 5)).toBe(5);
    expect(readCount({ pages: null }, 'pages', 5)).toBe(5);
  });

  it('rejects negative and non-numeric values', () => {
    expect(() => readCount({ pages: -1 }, 'pages', 5)).toThrow(ConfigurationError);
    expect(() => readCount({ pages: 'many' }, 'pages', 5)).toThrow(
      'Configuration "pages" must be a non-negative number, got "many"'
    );
    expect(() => readCount({ pages: true }, 'pages', 5)).toThrow(ConfigurationError);
  });
});
