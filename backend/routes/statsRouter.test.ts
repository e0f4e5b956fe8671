/**
 * Tests for stats route helpers
 */

import { parseRecentLimit } from './statsRouter';

describe('statsRouter', () => {
  describe('parseRecentLimit', () => {
    it('should default to 50 when absent or invalid', () => {
      expect(parseRecentLimit(undefined)).toBe(50);
      expect(parseRecentLimit('')).toBe(50);
      expect(parseRecentLimit('abc')).toBe(50);
      expect(parseRecentLimit('0')).toBe(50);
      expect(parseRecentLimit(['10', '20'])).toBe(50);
    });

    it('should cap the limit at 1000', () => {
      expect(parseRecentLimit('25')).toBe(25);
      expect(parseRecentLimit('5000')).toBe(1000);
    });
  });
});
