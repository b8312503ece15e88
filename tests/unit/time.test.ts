import { formatStorageTimestamp } from '@/utils/time';

describe('formatStorageTimestamp (unit)', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatStorageTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('20250102_030405');
  });

  it('pads double-digit fields correctly', () => {
    expect(formatStorageTimestamp(new Date(2025, 11, 31, 23, 59, 59))).toBe('20251231_235959');
  });
});
