import { IsDefined, IsObject, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class ProofOfWorkChallengeDto {
  @IsDefined()
  @IsString()
  seed!: string;

  @IsDefined()
  @IsString()
  difficulty!: string;
}

/** Body of the sentinel chat-requirements endpoint. Extra fields are ignored. */
export class ChatRequirementsDto {
  @IsDefined()
  @IsString()
  token!: string;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => ProofOfWorkChallengeDto)
  proofofwork!: ProofOfWorkChallengeDto;
}
