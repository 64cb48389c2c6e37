import { Body, Controller, HttpCode, HttpStatus, Logger, Options, Post, Res } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiExtraModels,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Response } from 'express';
import { ChatCompletionService } from './chat-completion.service';
import { CompletionAssemblerService } from './completion-assembler.service';
import { ChatCompletionRequestDto, ChatContentPartDto } from './dto/chat-completion-request.dto';
import { ChatCompletionResponseDto, ErrorEnvelopeDto } from './dto/chat-completion-response.dto';

/** Resolves once the socket can take more data, or once it is gone. */
function writable(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
  });
}

@ApiTags('chat')
@ApiExtraModels(ChatContentPartDto)
@Controller('v1')
export class ChatCompletionsController {
  private readonly logger = new Logger(ChatCompletionsController.name);

  constructor(
    private readonly chatCompletionService: ChatCompletionService,
    private readonly assembler: CompletionAssemblerService,
  ) {}

  @Post('chat/completions')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'OpenAI-compatible chat completions endpoint' })
  @ApiBody({ type: ChatCompletionRequestDto })
  @ApiOkResponse({
    type: ChatCompletionResponseDto,
    description: 'JSON completion, an SSE stream when stream=true, or the error envelope when the call fails',
  })
  @ApiUnauthorizedResponse({ type: ErrorEnvelopeDto })
  async chatCompletions(@Body() body: unknown, @Res() res: Response): Promise<void> {
    // the client's connection, from the first await on; cancels upstream work once it drops
    const client = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        this.logger.debug('Client disconnected, cancelling upstream work');
        client.abort();
      }
    };
    res.on('close', onClose);

    try {
      // errors up to here go through the exception filter; nothing has been written yet
      const assembly = await this.chatCompletionService.start(body, client.signal);
      if (res.destroyed) {
        assembly.cancel();
        return;
      }

      if (assembly.mode === 'buffered') {
        const completion = await this.assembler.collect(assembly);
        if (!res.destroyed) {
          res.status(HttpStatus.OK).json(completion);
        }
        return;
      }

      res.status(HttpStatus.OK);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no');
      res.flushHeaders();

      for await (const frame of this.assembler.frames(assembly)) {
        if (res.destroyed) break;
        if (!res.write(frame)) {
          await writable(res);
        }
      }
      if (!res.writableEnded) {
        res.end();
      }
    } finally {
      res.off('close', onClose);
    }
  }

  @Options('chat/completions')
  @HttpCode(HttpStatus.NO_CONTENT)
  preflight(): void {}
}
