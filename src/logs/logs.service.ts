import { Injectable, Inject, Logger, InternalServerErrorException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type nano from 'nano';
import { DATABASE_CONNECTION } from '../database/database.constants';
import type { AuditDatabase } from '../database/database.provider';
import type { LogActor, LogDocument, LogMeta, LogQuery } from './logs.types';

function selectorFor(query: LogQuery): nano.MangoSelector {
    const selector: nano.MangoSelector = { type: 'log' };
    if (query.action) selector.action = query.action;
    if (query.resource) selector.resource = query.resource;
    if (query.userId) selector['actor.userId'] = query.userId;
    return selector;
}

/**
 * Append-only audit trail of ledger mutations. Entries are keyed
 * `<sessionId>:log:<uuid>` and never updated.
 */
@Injectable()
export class LogsService {
    private readonly logger = new Logger(LogsService.name);

    constructor(@Inject(DATABASE_CONNECTION) private readonly db: AuditDatabase) { }

    async record(
        sessionId: string,
        actor: LogActor,
        action: string,
        resource: string,
        resourceId?: string | null,
        meta?: LogMeta,
    ): Promise<{ id: string; rev: string }> {
        const entry: LogDocument = {
            _id: `${sessionId}:log:${uuidv4()}`,
            type: 'log',
            sessionId,
            action,
            resource,
            resourceId: resourceId ?? null,
            actor: { userId: actor.userId, name: actor.name ?? null, role: actor.role ?? null },
            meta: meta ?? null,
            createdAt: new Date().toISOString(),
        };

        try {
            const { id, rev } = await this.db.insert(entry);
            return { id, rev };
        } catch (error) {
            this.logger.error(`Could not append ${action} to session ${sessionId}`, error);
            throw new InternalServerErrorException({ key: 'log.create_failed' });
        }
    }

    async findAll(sessionId: string, query: LogQuery = {}): Promise<LogDocument[]> {
        const mango: nano.MangoQuery = { selector: selectorFor(query) };
        if (query.limit !== undefined) mango.limit = query.limit;
        if (query.skip !== undefined) mango.skip = query.skip;

        try {
            const { docs } = await this.db.partitionedFind(sessionId, mango);
            return docs;
        } catch (error) {
            this.logger.error(`Could not read the audit trail of session ${sessionId}`, error);
            throw new InternalServerErrorException({ key: 'log.list_failed' });
        }
    }
}
