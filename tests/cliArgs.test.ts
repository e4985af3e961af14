import { describe, it, expect } from '@jest/globals';
import { parseCliArgs } from '../src/cli/args';

describe('parseCliArgs', () => {
  it('defaults to a full run for the latest day', () => {
    expect(parseCliArgs([])).toEqual({ scrapeOnly: false, help: false });
  });

  it('reads the date in both forms', () => {
    expect(parseCliArgs(['--date', '2025-01-15']).targetDate).toBe('2025-01-15');
    expect(parseCliArgs(['--date=2025-01-15']).targetDate).toBe('2025-01-15');
  });

  it('reads flags', () => {
    expect(parseCliArgs(['--scrape-only', '-h'])).toEqual({ scrapeOnly: true, help: true });
  });

  it('rejects a date flag without a value', () => {
    expect(() => parseCliArgs(['--date'])).toThrow('--date needs a value in YYYY-MM-DD form');
    expect(() => parseCliArgs(['--date', '--scrape-only'])).toThrow(RangeError);
  });

  it('rejects unknown arguments', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
  });
});
