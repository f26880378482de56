import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CALL_STORE, CallStore } from './call.store';
import { CallService } from './call.service';

export interface SweepResult {
  expiredInvitations: number;
  resolvedCalls: number;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error ?? 'unknown error');

/**
 * Periodically expires stale invitations and rings that nobody picked up.
 */
@Injectable()
export class CallSweepService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CallSweepService.name);
  private readonly ringTimeoutMs: number;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private isSweepRunning = false;

  constructor(
    @Inject(CALL_STORE)
    private readonly callStore: CallStore,
    private readonly callService: CallService,
    private readonly configService: ConfigService,
  ) {
    this.ringTimeoutMs =
      this.configService.get<number>('calls.ringTimeoutSeconds', 60) * 1000;
    this.intervalMs = this.configService.get<number>(
      'calls.sweepIntervalMs',
      15_000,
    );
  }

  onModuleInit() {
    if (this.intervalMs <= 0) {
      this.logger.log('Call sweep disabled');
      return;
    }

    this.timer = setInterval(() => {
      void this.sweep();
    }, this.intervalMs);
    this.timer.unref();
  }

  onModuleDestroy() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async sweep(now: Date = new Date()): Promise<SweepResult> {
    const result: SweepResult = { expiredInvitations: 0, resolvedCalls: 0 };
    if (this.isSweepRunning) {
      return result;
    }

    this.isSweepRunning = true;

    try {
      result.expiredInvitations = await this.callStore.expireInvitations(now);

      const cutoff = new Date(now.getTime() - this.ringTimeoutMs);
      const callIds = await this.callStore.findCallIdsRingingSince(cutoff);

      for (const callId of callIds) {
        try {
          await this.callService.expireUnanswered(callId, cutoff);
          result.resolvedCalls += 1;
        } catch (error) {
          this.logger.warn(
            `Ring timeout for call ${callId} failed: ${describeError(error)}`,
          );
        }
      }

      if (result.expiredInvitations > 0 || result.resolvedCalls > 0) {
        this.logger.log(
          `Sweep expired ${result.expiredInvitations} invitations, timed out rings in ${result.resolvedCalls} calls`,
        );
      }
    } catch (error) {
      this.logger.warn(`Call sweep failed: ${describeError(error)}`);
    } finally {
      this.isSweepRunning = false;
    }

    return result;
  }
}
