export enum CourtStatus {
  ACTIVE = 'ACTIVE',
  MAINTENANCE = 'MAINTENANCE',
}

export const DEFAULT_SLOT_DURATION_MINUTES = 60;

/**
 * Read-only view of a court as published by the court catalog.
 * Opening and closing times are wall-clock `HH:mm` values.
 */
export interface Court {
  id: string;
  name: string;
  status: CourtStatus;
  openingTime: string;
  closingTime: string;
  slotDurationMinutes: number;
  basePrice: number;
  memberPrice: number;
}
