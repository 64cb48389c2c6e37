import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ModelInfo } from '../../common/interfaces';
import { COMPLETION_MODEL } from '../../common/utils';

const MODEL_CREATED = 1626777600;

@Injectable()
export class ModelService implements OnModuleInit {
  private readonly logger = new Logger(ModelService.name);
  private readonly models = new Map<string, ModelInfo>();

  onModuleInit() {
    this.initializeModels();
  }

  private initializeModels() {
    const modelsList: ModelInfo[] = [
      {
        id: COMPLETION_MODEL,
        object: 'model',
        created: MODEL_CREATED,
        owned_by: 'openai',
        permission: [
          {
            id: 'modelperm-001',
            object: 'model_permission',
            created: MODEL_CREATED,
            allow_create_engine: true,
            allow_sampling: true,
            allow_logprobs: true,
            allow_search_indices: false,
            allow_view: true,
            allow_fine_tuning: false,
            organization: '*',
            group: null,
            is_blocking: false,
          },
        ],
        root: COMPLETION_MODEL,
        parent: null,
      },
    ];

    for (const model of modelsList) {
      this.models.set(model.id, model);
    }

    this.logger.log(`Initialized ${this.models.size} models`);
  }

  getAllModels(): ModelInfo[] {
    return Array.from(this.models.values());
  }
}
