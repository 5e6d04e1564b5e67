import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthenticatedRequest, isPrincipal, Principal } from '../interfaces/principal.interface';

export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Principal => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;
    if (!isPrincipal(user)) {
      throw new UnauthorizedException();
    }
    return user;
  },
);
