import { Court } from '../model/court';
import { COURT_CATALOG } from '../tokens';

export { COURT_CATALOG };
export interface CourtCatalog {
  findById(courtId: string): Promise<Court | null>;
}
