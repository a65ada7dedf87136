import { Provider, Logger, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import nano from 'nano';
import { DATABASE_CONNECTION } from './database.constants';
import type { LogDocument } from '../logs/logs.types';

export type AuditDatabase = nano.DocumentScope<LogDocument>;

const logger = new Logger('AuditDatabase');

/**
 * Connects to CouchDB and makes sure the audit database exists. It is
 * partitioned by session id, so one session's trail is read from one partition.
 */
export async function openAuditDatabase(url: string, name: string): Promise<AuditDatabase> {
    const server = nano(url);
    try {
        const existing = await server.db.list();
        if (!existing.includes(name)) {
            await server.db.create(name, { partitioned: true });
            logger.log(`Created partitioned audit database '${name}'`);
        }
    } catch (error) {
        logger.error(`Cannot reach the audit database '${name}'`, error);
        throw new InternalServerErrorException({ key: 'database.connect_failed' });
    }
    return server.db.use<LogDocument>(name);
}

export const databaseProvider: Provider = {
    provide: DATABASE_CONNECTION,
    useFactory: (configService: ConfigService): Promise<AuditDatabase> =>
        openAuditDatabase(
            configService.getOrThrow<string>('COUCHDB_URL'),
            configService.getOrThrow<string>('COUCHDB_DATABASE'),
        ),
    inject: [ConfigService],
};
