export interface TimeSlot {
  startTime: string;
  endTime: string;
  available: boolean;
  occupyingReservationId?: string;
}

export interface DaySchedule {
  date: string;
  courtId: string;
  courtName: string;
  slots: TimeSlot[];
}
