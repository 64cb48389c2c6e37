import { IsArray, IsDefined, IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class ConversationAuthorDto {
  @IsDefined()
  @IsString()
  role!: string;
}

export class ConversationContentDto {
  @IsOptional()
  @IsString()
  content_type?: string;

  @IsDefined()
  @IsArray()
  parts!: unknown[];
}

export class ConversationMessageDto {
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => ConversationAuthorDto)
  author!: ConversationAuthorDto;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => ConversationContentDto)
  content!: ConversationContentDto;
}

/**
 * One data frame of the conversation stream. Only frames carrying a message
 * matter; moderation and title frames come through without one.
 */
export class ConversationEventDto {
  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => ConversationMessageDto)
  message?: ConversationMessageDto | null;
}
