import { Module } from '@nestjs/common';
import { UpstreamModule } from '../upstream/upstream.module';
import { ChatCompletionsController } from './chat-completions.controller';
import { ChatCompletionService } from './chat-completion.service';
import { RequestTranslatorService } from './request-translator.service';
import { CompletionAssemblerService } from './completion-assembler.service';

@Module({
  imports: [UpstreamModule],
  controllers: [ChatCompletionsController],
  providers: [ChatCompletionService, RequestTranslatorService, CompletionAssemblerService],
})
export class ChatModule {}
