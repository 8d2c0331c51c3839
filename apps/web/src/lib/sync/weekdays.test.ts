import { describe, expect, it } from 'vitest';
import { WEEKDAYS_ALL, WEEKDAYS_NONE, decodeWeekdays, encodeWeekdays } from './weekdays';

describe('encodeWeekdays', () => {
  it('treats unset days as enabled', () => {
    expect(encodeWeekdays({})).toBe(WEEKDAYS_ALL);
  });

  it('clears the bit of each disabled day, Sunday first', () => {
    expect(encodeWeekdays({ sunday: false })).toBe(126);
    expect(encodeWeekdays({ saturday: false, sunday: false })).toBe(62);
  });

  it('encodes a fully disabled week as zero', () => {
    expect(
      encodeWeekdays({
        sunday: false,
        monday: false,
        tuesday: false,
        wednesday: false,
        thursday: false,
        friday: false,
        saturday: false,
      }),
    ).toBe(WEEKDAYS_NONE);
  });
});

describe('decodeWeekdays', () => {
  it('reads weekdays only', () => {
    expect(decodeWeekdays(62)).toEqual({
      sunday: false,
      monday: true,
      tuesday: true,
      wednesday: true,
      thursday: true,
      friday: true,
      saturday: false,
    });
  });

  it('inverts encodeWeekdays for a full selection', () => {
    const selection = {
      sunday: true,
      monday: false,
      tuesday: true,
      wednesday: false,
      thursday: true,
      friday: false,
      saturday: true,
    };
    expect(decodeWeekdays(encodeWeekdays(selection))).toEqual(selection);
  });

  it('ignores bits above Saturday and non-integers', () => {
    expect(decodeWeekdays(128 + 1).sunday).toBe(true);
    expect(decodeWeekdays(128 + 1).monday).toBe(false);
    expect(Object.values(decodeWeekdays(1.5)).every((enabled) => !enabled)).toBe(true);
  });
});
