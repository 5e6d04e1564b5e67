import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import appConfig from '../config/app.config';
import { AllEntities } from './entities';
import { TransientRetryService } from './transient-retry.service';

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: () => {
        const db = appConfig().database;
        return {
          type: 'postgres' as const,
          url: db.url,
          host: db.host,
          port: db.port,
          username: db.username,
          password: db.password,
          database: db.database,
          entities: AllEntities,
          synchronize: db.synchronize,
          logging: db.logging,
        };
      },
    }),
  ],
  providers: [TransientRetryService],
  exports: [TransientRetryService],
})
export class DatabaseModule { }
