import {
  Controller,
  Get,
  Post,
  Body,
  Patch,
  Param,
  ParseUUIDPipe,
  UseGuards,
  Request,
  Query,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import {
  ApiTags,
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiParam,
} from '@nestjs/swagger';
import { CallService } from './call.service';
import { IceConfigService } from './ice-config.service';
import { toCallResponse, toHistoryItem, toParticipantResponse } from './call.mapper';
import {
  ActiveCallsResponseDto,
  AnswerCallDto,
  CallAnswerResponseDto,
  CallHistoryQueryDto,
  CallHistoryResponseDto,
  CallInitiateResponseDto,
  CallInviteResponseDto,
  CallParticipantResponseDto,
  CallResponseDto,
  DeclineCallDto,
  EndCallDto,
  InitiateCallDto,
  InviteToCallDto,
  UpdateMediaStateDto,
  WebRtcConfigDto,
} from '../dto/call.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedUser } from '../auth/jwt.strategy';

interface AuthenticatedRequest {
  user: AuthenticatedUser;
}

@ApiTags('calls')
@Controller('calls')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth()
export class CallController {
  constructor(
    private readonly callService: CallService,
    private readonly iceConfigService: IceConfigService,
  ) {}

  @Post('initiate')
  @ApiOperation({ summary: 'Start a 1-on-1 or group call' })
  @ApiResponse({
    status: 201,
    description: 'Call created and invitees are ringing',
    type: CallInitiateResponseDto,
  })
  @ApiResponse({ status: 404, description: 'Participant not found' })
  @ApiResponse({ status: 409, description: 'Already in a call with the user' })
  async initiate(
    @Body() initiateCallDto: InitiateCallDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallInitiateResponseDto> {
    const call = await this.callService.initiate(req.user.id, initiateCallDto);
    return {
      message: 'Call initiated',
      call: toCallResponse(call),
      iceServers: this.iceConfigService.iceServers,
    };
  }

  @Get('history')
  @ApiOperation({ summary: 'Calls the current user took part in' })
  @ApiResponse({ status: 200, type: CallHistoryResponseDto })
  async history(
    @Query() query: CallHistoryQueryDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallHistoryResponseDto> {
    const limit = query.limit ?? 50;
    const offset = query.offset ?? 0;
    const { calls, total } = await this.callService.history(
      req.user.id,
      limit,
      offset,
    );

    return {
      calls: calls.map((call) => toHistoryItem(call, req.user.id)),
      total,
      page: Math.floor(offset / limit) + 1,
      limit,
      hasMore: offset + calls.length < total,
    };
  }

  @Get('active')
  @ApiOperation({ summary: 'Live calls the current user has joined' })
  @ApiResponse({ status: 200, type: ActiveCallsResponseDto })
  async active(
    @Request() req: AuthenticatedRequest,
  ): Promise<ActiveCallsResponseDto> {
    const calls = await this.callService.findActive(req.user.id);
    return {
      calls: calls.map((call) => toCallResponse(call)),
      total: calls.length,
    };
  }

  @Get('config')
  @ApiOperation({ summary: 'ICE servers for establishing peer connections' })
  @ApiResponse({ status: 200, type: WebRtcConfigDto })
  getConfig(): WebRtcConfigDto {
    return this.iceConfigService.getWebRtcConfig();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a call' })
  @ApiParam({ name: 'id', description: 'Call ID (UUID)' })
  @ApiResponse({ status: 200, type: CallResponseDto })
  @ApiResponse({ status: 403, description: 'Not a participant' })
  @ApiResponse({ status: 404, description: 'Call not found' })
  async findOne(
    @Param('id', ParseUUIDPipe) id: string,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallResponseDto> {
    return toCallResponse(await this.callService.findOne(id, req.user.id));
  }

  @Post(':id/answer')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Answer a ringing call' })
  @ApiParam({ name: 'id', description: 'Call ID (UUID)' })
  @ApiResponse({ status: 200, type: CallAnswerResponseDto })
  @ApiResponse({ status: 400, description: 'Call cannot be answered' })
  async answer(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() answerCallDto: AnswerCallDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallAnswerResponseDto> {
    const call = await this.callService.answer(
      id,
      req.user.id,
      answerCallDto.metadata,
    );
    return {
      call: toCallResponse(call),
      iceServers: this.iceConfigService.iceServers,
    };
  }

  @Post(':id/decline')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Decline a ringing call' })
  @ApiParam({ name: 'id', description: 'Call ID (UUID)' })
  @ApiResponse({ status: 200, type: CallResponseDto })
  async decline(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() declineCallDto: DeclineCallDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallResponseDto> {
    const call = await this.callService.decline(
      id,
      req.user.id,
      declineCallDto.reason,
    );
    return toCallResponse(call);
  }

  @Post(':id/end')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Leave a call, ending it when nobody remains' })
  @ApiParam({ name: 'id', description: 'Call ID (UUID)' })
  @ApiResponse({ status: 200, type: CallResponseDto })
  async end(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() endCallDto: EndCallDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallResponseDto> {
    const call = await this.callService.end(id, req.user.id, endCallDto.reason);
    return toCallResponse(call);
  }

  @Post(':id/invite')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Invite more users into an active group call' })
  @ApiParam({ name: 'id', description: 'Call ID (UUID)' })
  @ApiResponse({ status: 200, type: CallInviteResponseDto })
  async invite(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() inviteToCallDto: InviteToCallDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallInviteResponseDto> {
    const participants = await this.callService.inviteToCall(
      id,
      req.user.id,
      inviteToCallDto.userIds,
    );
    return {
      message: `Invited ${participants.length} users`,
      invitedCount: participants.length,
      participants: participants.map((participant) =>
        toParticipantResponse(participant),
      ),
    };
  }

  @Patch(':id/media')
  @ApiOperation({ summary: 'Update mute, camera or screen share state' })
  @ApiParam({ name: 'id', description: 'Call ID (UUID)' })
  @ApiResponse({ status: 200, type: CallParticipantResponseDto })
  async updateMediaState(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateMediaStateDto: UpdateMediaStateDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CallParticipantResponseDto> {
    const participant = await this.callService.updateMediaState(
      id,
      req.user.id,
      updateMediaStateDto,
    );
    return toParticipantResponse(participant);
  }
}
