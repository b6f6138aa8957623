import { Court } from '../model/court';
import { Interval, toMinutes } from '../utils/wall-clock';

/**
 * Splits `[openingTime, closingTime)` into consecutive slots of
 * `slotDurationMinutes`. A trailing slot that would end after closing is
 * dropped.
 */
export function buildSlotGrid(
  openingTime: string,
  closingTime: string,
  slotDurationMinutes: number,
): Interval[] {
  if (!Number.isInteger(slotDurationMinutes) || slotDurationMinutes <= 0) {
    return [];
  }

  const open = toMinutes(openingTime);
  const close = toMinutes(closingTime);
  const slots: Interval[] = [];

  for (
    let start = open;
    start + slotDurationMinutes <= close;
    start += slotDurationMinutes
  ) {
    slots.push({ start, end: start + slotDurationMinutes });
  }

  return slots;
}

export const slotGridFor = (court: Court): Interval[] =>
  buildSlotGrid(
    court.openingTime,
    court.closingTime,
    court.slotDurationMinutes,
  );
