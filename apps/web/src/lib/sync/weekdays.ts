// Bit i (0 = Sunday) marks a day the story may air on.
export const WEEKDAY_NAMES = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

/** Unset days count as enabled. */
export type WeekdaySelection = Partial<Record<WeekdayName, boolean>>;

export const WEEKDAYS_ALL = 127;
export const WEEKDAYS_NONE = 0;

export function encodeWeekdays(selection: WeekdaySelection): number {
  let mask = 0;
  WEEKDAY_NAMES.forEach((day, index) => {
    if (selection[day] !== false) {
      mask |= 1 << index;
    }
  });
  return mask;
}

export function decodeWeekdays(mask: number): Record<WeekdayName, boolean> {
  const normalized = Number.isInteger(mask) ? mask & WEEKDAYS_ALL : WEEKDAYS_NONE;
  const isSet = (index: number) => (normalized & (1 << index)) !== 0;
  return {
    sunday: isSet(0),
    monday: isSet(1),
    tuesday: isSet(2),
    wednesday: isSet(3),
    thursday: isSet(4),
    friday: isSet(5),
    saturday: isSet(6),
  };
}
