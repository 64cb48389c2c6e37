import { Controller, Get, HttpCode, HttpStatus, Options } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiBearerAuth } from '@nestjs/swagger';
import { ModelInfo } from '../../common/interfaces';
import { ModelService } from './model.service';

@ApiTags('models')
@Controller('v1/models')
export class ModelController {
  constructor(private readonly modelService: ModelService) {}

  @Get()
  @ApiBearerAuth()
  @ApiOperation({ summary: 'List available models (OpenAI-compatible)' })
  listModels(): { object: 'list'; data: ModelInfo[] } {
    return {
      object: 'list',
      data: this.modelService.getAllModels(),
    };
  }

  @Options()
  @HttpCode(HttpStatus.NO_CONTENT)
  preflight(): void {}
}
