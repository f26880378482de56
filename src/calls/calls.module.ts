import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '../config/database.module';
import { RealtimeModule } from '../realtime/realtime.module';
import { AuthModule } from '../auth/auth.module';
import { CallController } from './call.controller';
import { CallService } from './call.service';
import { CallSweepService } from './call-sweep.service';
import { IceConfigService } from './ice-config.service';
import { TypeOrmCallStore } from './typeorm-call.store';
import { CALL_STORE } from './call.store';

@Module({
  imports: [DatabaseModule, ConfigModule, RealtimeModule, AuthModule],
  controllers: [CallController],
  providers: [
    CallService,
    CallSweepService,
    IceConfigService,
    { provide: CALL_STORE, useClass: TypeOrmCallStore },
  ],
  exports: [CallService, IceConfigService],
})
export class CallsModule {}
