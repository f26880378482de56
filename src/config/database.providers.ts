import { DataSource } from 'typeorm';
import { ConfigService } from '@nestjs/config';
import { User, Call, CallParticipant, CallInvitation } from '../entities';

export const DATA_SOURCE = 'DATA_SOURCE';

export const databaseProviders = [
  {
    provide: DATA_SOURCE,
    useFactory: async (configService: ConfigService) => {
      const dataSource = new DataSource({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.username'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.database'),
        entities: [User, Call, CallParticipant, CallInvitation],
        synchronize: configService.get<boolean>('database.synchronize', false),
        logging: configService.get<boolean>('database.logging', false),
      });

      return dataSource.initialize();
    },
    inject: [ConfigService],
  },
];
