import { formatBytes, formatTimeBetween } from '../src/format';

describe('format', () => {
  describe('formatBytes', () => {
    it('formats with decimal units', () => {
      expect(formatBytes(512)).toBe('512 B');
      expect(formatBytes(1500)).toBe('1.50 KB');
      expect(formatBytes(123456789)).toBe('123.46 MB');
    });

    it('returns N/A for unknown sizes', () => {
      expect(formatBytes(undefined)).toBe('N/A');
      expect(formatBytes(-1)).toBe('N/A');
    });
  });

  describe('formatTimeBetween', () => {
    it('formats milliseconds, seconds and minutes', () => {
      expect(formatTimeBetween(0, 850)).toBe('850ms');
      expect(formatTimeBetween(0, 5400)).toBe('5s');
      expect(formatTimeBetween(1000, 66000)).toBe('1m 5s');
    });
  });
});
