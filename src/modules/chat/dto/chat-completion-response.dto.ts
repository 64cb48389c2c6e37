import { ApiProperty } from '@nestjs/swagger';

export class ChatCompletionMessageResultDto {
  @ApiProperty({ example: 'assistant' })
  role!: 'assistant';

  @ApiProperty()
  content!: string;
}

export class ChatCompletionChoiceDto {
  @ApiProperty({ example: 0 })
  index!: number;

  @ApiProperty({ type: ChatCompletionMessageResultDto })
  message!: ChatCompletionMessageResultDto;

  @ApiProperty({ example: 'stop' })
  finish_reason!: 'stop';
}

export class ChatCompletionUsageDto {
  @ApiProperty()
  prompt_tokens!: number;

  @ApiProperty()
  completion_tokens!: number;

  @ApiProperty()
  total_tokens!: number;
}

export class ChatCompletionResponseDto {
  @ApiProperty({ example: 'chatcmpl-0123456789abcdef' })
  id!: string;

  @ApiProperty({ example: 'chat.completion' })
  object!: 'chat.completion';

  @ApiProperty()
  created!: number;

  @ApiProperty({ example: 'gpt-3.5-turbo' })
  model!: string;

  @ApiProperty({ type: [ChatCompletionChoiceDto] })
  choices!: ChatCompletionChoiceDto[];

  @ApiProperty({ type: ChatCompletionUsageDto })
  usage!: ChatCompletionUsageDto;
}

export class ErrorDetailDto {
  @ApiProperty()
  message!: string;

  @ApiProperty({ example: 'invalid_request_error' })
  type!: 'invalid_request_error';
}

export class ErrorEnvelopeDto {
  @ApiProperty({ example: false })
  status!: false;

  @ApiProperty({ type: ErrorDetailDto })
  error!: ErrorDetailDto;
}
