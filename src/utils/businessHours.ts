import { DateTime } from 'luxon';

export interface DayHours {
  open: string;
  close: string;
}

export interface BusinessHoursConfig {
  monday: DayHours | null;
  tuesday: DayHours | null;
  wednesday: DayHours | null;
  thursday: DayHours | null;
  friday: DayHours | null;
  saturday: DayHours | null;
  sunday: DayHours | null;
}

export const DEFAULT_BUSINESS_HOURS: BusinessHoursConfig = {
  monday: { open: '08:00', close: '18:00' },
  tuesday: { open: '08:00', close: '18:00' },
  wednesday: { open: '08:00', close: '18:00' },
  thursday: { open: '08:00', close: '18:00' },
  friday: { open: '08:00', close: '18:00' },
  saturday: null,
  sunday: null,
};

const DAY_NAMES: (keyof BusinessHoursConfig)[] = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
];

function toMinutes(hhmm: string): number {
  const [h, m] = hhmm.split(':').map(Number);
  return h * 60 + m;
}

function hoursFor(at: DateTime, config: BusinessHoursConfig): DayHours | null {
  // Luxon weekday is 1-based (Mon=1)
  return config[DAY_NAMES[at.weekday - 1]];
}

export function isWithinBusinessHours(
  timezone: string,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS,
  at: DateTime = DateTime.now()
): boolean {
  const local = at.setZone(timezone);
  const dayHours = hoursFor(local, config);
  if (!dayHours) return false;

  const nowMinutes = local.hour * 60 + local.minute;
  return nowMinutes >= toMinutes(dayHours.open) && nowMinutes < toMinutes(dayHours.close);
}

export function getNextBusinessWindow(
  timezone: string,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS,
  at: DateTime = DateTime.now()
): { start: DateTime; end: DateTime } | null {
  const reference = at.setZone(timezone);
  let check = reference;

  for (let i = 0; i < 7; i++) {
    const dayHours = hoursFor(check, config);

    if (dayHours) {
      const [openH, openM] = dayHours.open.split(':').map(Number);
      const [closeH, closeM] = dayHours.close.split(':').map(Number);
      const start = check.set({ hour: openH, minute: openM, second: 0, millisecond: 0 });
      const end = check.set({ hour: closeH, minute: closeM, second: 0, millisecond: 0 });

      if (start > reference) {
        return { start, end };
      }
    }

    check = check.plus({ days: 1 }).startOf('day');
  }

  return null;
}
