import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CallsModule } from '../calls/calls.module';
import { RealtimeModule } from '../realtime/realtime.module';
import { SignalingGateway } from './signaling.gateway';
import { SignalingRelayService } from './signaling-relay.service';

@Module({
  imports: [AuthModule, CallsModule, RealtimeModule],
  providers: [SignalingGateway, SignalingRelayService],
})
export class SignalingModule {}
