import { UserContext } from '../model/user';
import { USER_DIRECTORY } from '../tokens';

export { USER_DIRECTORY };
export interface UserDirectory {
  findById(userId: string): Promise<UserContext | null>;
}
