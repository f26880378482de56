import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './config/database.module';
import { AuthModule } from './auth/auth.module';
import { CallsModule } from './calls/calls.module';
import { RealtimeModule } from './realtime/realtime.module';
import { SignalingModule } from './signaling/signaling.module';
import configuration from './config/configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    DatabaseModule,
    AuthModule,
    RealtimeModule,
    CallsModule,
    SignalingModule,
  ],
})
export class AppModule {}
