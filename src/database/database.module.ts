import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DATABASE_CONNECTION } from './database.constants';
import { databaseProvider } from './database.provider';

/** CouchDB handle for the audit trail. Lot state itself never touches the database. */
@Module({
  imports: [ConfigModule],
  providers: [databaseProvider],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule {}
