import { PageRequest } from '../model/page';

export class ListUserReservationsQuery {
  constructor(readonly userId: string, readonly page: PageRequest) {}
}
