import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IceServerDto, WebRtcConfigDto } from '../dto/call.dto';

interface WebRtcSettings {
  stunUrls: string[];
  turnUrl: string;
  turnUsername: string;
  turnCredential: string;
  iceTransportPolicy: 'all' | 'relay';
}

@Injectable()
export class IceConfigService {
  private readonly logger = new Logger(IceConfigService.name);
  private readonly settings: WebRtcSettings;

  constructor(private readonly configService: ConfigService) {
    const policy = this.configService.get<string>(
      'webrtc.iceTransportPolicy',
      'all',
    );

    this.settings = {
      stunUrls: this.configService.get<string[]>('webrtc.stunUrls', []),
      turnUrl: this.configService.get<string>('webrtc.turnUrl', ''),
      turnUsername: this.configService.get<string>('webrtc.turnUsername', ''),
      turnCredential: this.configService.get<string>(
        'webrtc.turnCredential',
        '',
      ),
      iceTransportPolicy: policy === 'relay' ? 'relay' : 'all',
    };

    if (!this.hasTurnServer()) {
      this.logger.warn(
        'TURN server is not configured; peers behind symmetric NATs may fail to connect',
      );
    }
  }

  get iceServers(): IceServerDto[] {
    const servers: IceServerDto[] = [];

    if (this.settings.stunUrls.length > 0) {
      servers.push({ urls: [...this.settings.stunUrls] });
    }

    if (this.hasTurnServer()) {
      servers.push({
        urls: this.settings.turnUrl,
        username: this.settings.turnUsername,
        credential: this.settings.turnCredential,
      });
    }

    return servers;
  }

  getWebRtcConfig(): WebRtcConfigDto {
    return {
      iceServers: this.iceServers,
      iceTransportPolicy: this.settings.iceTransportPolicy,
    };
  }

  private hasTurnServer(): boolean {
    return Boolean(
      this.settings.turnUrl &&
        this.settings.turnUsername &&
        this.settings.turnCredential,
    );
  }
}
