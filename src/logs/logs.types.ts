export interface LogActor {
    userId: string;
    name?: string;
    role?: string;
}

export type LogMeta = Record<string, unknown>;

export interface LogDocument {
    _id: string;
    type: 'log';
    sessionId: string;
    action: string;
    resource: string;
    resourceId: string | null;
    actor: {
        userId: string;
        name: string | null;
        role: string | null;
    };
    meta: LogMeta | null;
    createdAt: string;
}

export interface LogQuery {
    action?: string;
    resource?: string;
    userId?: string;
    limit?: number;
    skip?: number;
}
