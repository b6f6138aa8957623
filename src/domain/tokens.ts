export const RESERVATION_REPOSITORY = 'RESERVATION_REPOSITORY';
export const COURT_CATALOG = 'COURT_CATALOG';
export const USER_DIRECTORY = 'USER_DIRECTORY';
export const COURT_DATE_LOCK = 'COURT_DATE_LOCK';
export const CLOCK = 'CLOCK';
