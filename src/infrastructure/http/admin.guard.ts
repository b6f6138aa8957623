import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Inject,
  Injectable,
} from '@nestjs/common';

import { Role } from '../../domain/model/user';
import {
  USER_DIRECTORY,
  UserDirectory,
} from '../../domain/ports/user-directory';
import { RequestWithHeaders, userIdFrom } from './current-user.decorator';

@Injectable()
export class AdminGuard implements CanActivate {
  constructor(
    @Inject(USER_DIRECTORY) private readonly userDirectory: UserDirectory,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const userId = userIdFrom(
      context.switchToHttp().getRequest<RequestWithHeaders>(),
    );
    const user = await this.userDirectory.findById(userId);
    if (user?.role !== Role.ADMIN) {
      throw new ForbiddenException('Administrator role required');
    }
    return true;
  }
}
