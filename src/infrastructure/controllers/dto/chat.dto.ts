import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsArray, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { ChatInput } from '../../../application/use-cases/chat.use-case';

export class UserMessageDto {
  @ApiPropertyOptional({ enum: ['user_message'], default: 'user_message' })
  @IsOptional()
  @IsIn(['user_message'])
  type?: 'user_message';

  @ApiProperty({ example: 'What does this mean for mortgage rates?' })
  @IsString()
  @IsNotEmpty()
  content!: string;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  chat_history?: string[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  selected_news_article?: string;

  @ApiPropertyOptional({ minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  token_budget?: number;
}

export class BotResponseDto {
  @ApiProperty({ enum: ['bot_response'] })
  type!: 'bot_response';

  @ApiProperty()
  content!: string;
}

export function toChatInput(dto: UserMessageDto): ChatInput {
  return {
    content: dto.content,
    chatHistory: dto.chat_history,
    selectedArticle: dto.selected_news_article,
    tokenBudget: dto.token_budget,
  };
}
