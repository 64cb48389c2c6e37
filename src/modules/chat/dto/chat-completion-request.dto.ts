import { ApiProperty, ApiPropertyOptional, getSchemaPath } from '@nestjs/swagger';
import { ArrayNotEmpty, IsArray, IsBoolean, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class ChatContentPartDto {
  @ApiProperty({ example: 'text' })
  type!: string;

  @ApiProperty()
  text!: string;
}

export class ChatCompletionMessageDto {
  @ApiProperty({ example: 'user', description: 'system (at most once), user or assistant' })
  @IsString()
  @IsNotEmpty()
  role!: string;

  // string or single-part array, read by extractContentText
  @ApiProperty({
    description: 'Plain text, or an array holding exactly one text part',
    oneOf: [{ type: 'string' }, { type: 'array', items: { $ref: getSchemaPath(ChatContentPartDto) } }],
  })
  content!: unknown;
}

export class ChatCompletionRequestDto {
  @ApiPropertyOptional({ type: String, example: 'gpt-3.5-turbo' })
  model?: unknown;

  @ApiProperty({ type: [ChatCompletionMessageDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => ChatCompletionMessageDto)
  messages!: ChatCompletionMessageDto[];

  @ApiPropertyOptional({ example: false })
  @IsOptional()
  @IsBoolean()
  stream?: boolean | null;
}
