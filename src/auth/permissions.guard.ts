import { Injectable, CanActivate, ExecutionContext, ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { REQUIRED_PERMISSIONS } from './permissions.decorator';
import { DEFAULT_ROLE_PERMISSIONS, Permission } from './permissions.enum';
import type { RequestWithUser, UserPayload } from './auth.guard';

// Tokens may narrow a role with an explicit list; otherwise the role's defaults apply.
const grantedTo = (user: UserPayload): readonly Permission[] =>
    user.permissions ?? DEFAULT_ROLE_PERMISSIONS[user.role];

@Injectable()
export class PermissionsGuard implements CanActivate {
    constructor(private readonly reflector: Reflector) { }

    canActivate(context: ExecutionContext): boolean {
        const required = this.reflector.getAllAndOverride<Permission[] | undefined>(REQUIRED_PERMISSIONS, [
            context.getHandler(),
            context.getClass(),
        ]);
        if (!required?.length) {
            return true;
        }

        const { user } = context.switchToHttp().getRequest<Partial<RequestWithUser>>();
        if (!user) {
            throw new ForbiddenException({ key: 'auth.no_permission' });
        }

        // The session owner runs every stock operation
        if (user.role === 'owner') {
            return true;
        }

        const granted = grantedTo(user);
        if (!required.some((permission) => granted.includes(permission))) {
            throw new ForbiddenException({ key: 'auth.no_permission' });
        }
        return true;
    }
}
