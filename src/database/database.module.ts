import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { envBoolean, envString } from '../config/env';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: () => ({
        type: 'postgres',
        url: envString('DATABASE_URL', 'postgres://localhost:5432/freight_matching'),
        autoLoadEntities: true,
        synchronize: envBoolean('DB_SYNCHRONIZE', false),
        logging: envBoolean('DB_LOGGING', false),
      }),
    }),
  ],
})
export class DatabaseModule {}
