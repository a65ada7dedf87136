import {
    Injectable,
    CanActivate,
    ExecutionContext,
    UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import * as jwt from 'jsonwebtoken';
import { ConfigService } from '@nestjs/config';
import { Permission } from './permissions.enum';

export type SessionRole = 'player' | 'manager' | 'owner';

const ROLES: readonly SessionRole[] = ['player', 'manager', 'owner'];
const PERMISSIONS: readonly string[] = Object.values(Permission);

/**
 * Claims of a token issued by the session host. `sessionId` selects the
 * game session, and therefore the ledger, every request operates on.
 */
export interface UserPayload {
    userId: string;
    sessionId: string;
    name: string;
    role: SessionRole;
    permissions?: Permission[];
}

export interface RequestWithUser extends Request {
    user: UserPayload;
}

@Injectable()
export class AuthGuard implements CanActivate {
    private readonly jwtSecret: string;

    constructor(private configService: ConfigService) {
        const secret = this.configService.get<string>('JWT_SECRET');

        if (!secret) {
            throw new Error('FATAL ERROR: JWT_SECRET is not defined in the environment variables.');
        }

        this.jwtSecret = secret;
    }

    canActivate(context: ExecutionContext): boolean {
        const request = context.switchToHttp().getRequest<RequestWithUser>();
        const token = this.extractTokenFromHeader(request);

        if (!token) {
            throw new UnauthorizedException({ key: 'auth.token_not_found' });
        }

        try {
            const decodedPayload: unknown = jwt.verify(token, this.jwtSecret);

            if (!this.isValidPayload(decodedPayload)) {
                throw new UnauthorizedException({ key: 'auth.invalid_token_payload' });
            }

            request.user = decodedPayload;
        } catch (error) {
            if (error instanceof jwt.TokenExpiredError) {
                throw new UnauthorizedException({ key: 'auth.token_expired' });
            }
            if (error instanceof jwt.JsonWebTokenError) {
                throw new UnauthorizedException({ key: 'auth.invalid_token' });
            }
            throw error;
        }
        return true;
    }

    private extractTokenFromHeader(request: Request): string | undefined {
        const [type, token] = request.headers.authorization?.split(' ') ?? [];
        return type === 'Bearer' ? token : undefined;
    }

    private isValidPayload(payload: unknown): payload is UserPayload {
        if (
            typeof payload !== 'object' ||
            payload === null ||
            !('userId' in payload && 'sessionId' in payload && 'name' in payload && 'role' in payload)
        ) {
            return false;
        }

        const { role } = payload;
        const permissions = 'permissions' in payload ? payload.permissions : undefined;

        return (
            typeof payload.userId === 'string' &&
            typeof payload.sessionId === 'string' &&
            typeof payload.name === 'string' &&
            ROLES.some((known) => known === role) &&
            (permissions === undefined ||
                (Array.isArray(permissions) &&
                    permissions.every((perm) => typeof perm === 'string' && PERMISSIONS.includes(perm))))
        );
    }
}
