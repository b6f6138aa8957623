export interface CourtUsageStat {
  courtId: string;
  courtName: string;
  reservationCount: number;
  revenue: number;
}

export interface ReservationStats {
  totalReservationsToday: number;
  totalReservationsWeek: number;
  totalReservationsMonth: number;
  totalRevenue: number;
  courtUsage: CourtUsageStat[];
}
