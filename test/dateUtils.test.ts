import {
  dayOfYearIndex,
  formatCompactDate,
  formatDate,
  getYearsToCheck,
  isOlderThanDays,
  parseOrderDate,
} from '../src/utils/dateUtils';

describe('dateUtils', () => {
  describe('formatDate', () => {
    it('should format date to YYYY-MM-DD', () => {
      expect(formatDate(new Date(2025, 0, 15))).toBe('2025-01-15');
    });

    it('should pad single digit days and months', () => {
      expect(formatDate(new Date(2025, 8, 5))).toBe('2025-09-05');
    });
  });

  describe('formatCompactDate', () => {
    it('should format date to YYYYMMDD', () => {
      expect(formatCompactDate(new Date(2024, 11, 30))).toBe('20241230');
    });
  });

  describe('dayOfYearIndex', () => {
    it('should count 1 January as day 0', () => {
      expect(dayOfYearIndex(new Date(2025, 0, 1))).toBe(0);
    });

    it('should count across month boundaries', () => {
      expect(dayOfYearIndex(new Date(2025, 1, 25))).toBe(55);
      expect(dayOfYearIndex(new Date(2024, 11, 31))).toBe(365);
    });
  });

  describe('getYearsToCheck', () => {
    it('should include the previous year early in January', () => {
      expect(getYearsToCheck(new Date(2025, 0, 10))).toEqual([2024, 2025]);
    });

    it('should include the previous year on the last grace day', () => {
      expect(getYearsToCheck(new Date(2025, 1, 25))).toEqual([2024, 2025]);
    });

    it('should drop the previous year after the grace period', () => {
      expect(getYearsToCheck(new Date(2025, 1, 26))).toEqual([2025]);
      expect(getYearsToCheck(new Date(2025, 2, 15))).toEqual([2025]);
    });

    it('should only check the current year late in December', () => {
      expect(getYearsToCheck(new Date(2024, 11, 30))).toEqual([2024]);
    });

    it('should cover every year from the floor', () => {
      expect(getYearsToCheck(new Date(2025, 5, 1), 2022)).toEqual([2022, 2023, 2024, 2025]);
    });

    it('should not look back below the floor', () => {
      expect(getYearsToCheck(new Date(2025, 0, 10), 2025)).toEqual([2025]);
    });

    it('should return nothing when the floor is in the future', () => {
      expect(getYearsToCheck(new Date(2025, 0, 10), 2026)).toEqual([]);
    });
  });

  describe('parseOrderDate', () => {
    it('should parse German long dates', () => {
      expect(parseOrderDate('30. Dezember 2024')).toEqual(new Date(2024, 11, 30));
      expect(parseOrderDate('3. März 2025')).toEqual(new Date(2025, 2, 3));
    });

    it('should parse English dates in both orders', () => {
      expect(parseOrderDate('30 December 2024')).toEqual(new Date(2024, 11, 30));
      expect(parseOrderDate('December 30, 2024')).toEqual(new Date(2024, 11, 30));
    });

    it('should parse numeric dates', () => {
      expect(parseOrderDate('05.01.2025')).toEqual(new Date(2025, 0, 5));
    });

    it('should reject impossible dates', () => {
      expect(parseOrderDate('31.02.2025')).toBeNull();
    });

    it('should return null for text without a date', () => {
      expect(parseOrderDate('Summe € 12,99')).toBeNull();
      expect(parseOrderDate('12 Foo 2024')).toBeNull();
    });
  });

  describe('isOlderThanDays', () => {
    const now = new Date(2025, 0, 20);

    it('should be true past the threshold', () => {
      expect(isOlderThanDays(new Date(2025, 0, 1), 14, now)).toBe(true);
    });

    it('should be false within the threshold', () => {
      expect(isOlderThanDays(new Date(2025, 0, 10), 14, now)).toBe(false);
    });
  });
});
