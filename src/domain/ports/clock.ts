import { CLOCK } from '../tokens';

export { CLOCK };
export interface Clock {
  now(): Date;
}
