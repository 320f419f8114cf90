import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { BotResponse, ChatUseCase } from '../../application/use-cases/chat.use-case';
import { BotResponseDto, toChatInput, UserMessageDto } from './dto/chat.dto';

@ApiTags('chat')
@Controller('ws')
export class ChatController {
  constructor(private readonly chat: ChatUseCase) {}

  @Post('chat')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Answer a chat message about the selected article' })
  @ApiOkResponse({ type: BotResponseDto })
  async send(@Body() message: UserMessageDto): Promise<BotResponse> {
    return this.chat.execute(toChatInput(message), 'http');
  }
}
