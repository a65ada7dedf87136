import { CustomDecorator, SetMetadata } from '@nestjs/common';
import { Permission } from './permissions.enum';

export const REQUIRED_PERMISSIONS = 'stock:required-permissions';

/** Holding any one of `permissions` opens the route. */
export const RequirePermissions = (...permissions: Permission[]): CustomDecorator<string> =>
    SetMetadata(REQUIRED_PERMISSIONS, permissions);
