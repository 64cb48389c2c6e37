import { Injectable, Logger } from '@nestjs/common';
import { ClientClosedError } from '../../common/errors';
import { SessionService } from '../upstream/session.service';
import { ProofOfWorkService } from '../upstream/proof-of-work.service';
import { UpstreamRelayService } from '../upstream/upstream-relay.service';
import { RequestTranslatorService } from './request-translator.service';
import { CompletionAssemblerService } from './completion-assembler.service';
import { CompletionAssembly } from './completion-assembly';

@Injectable()
export class ChatCompletionService {
  private readonly logger = new Logger(ChatCompletionService.name);

  constructor(
    private readonly translator: RequestTranslatorService,
    private readonly sessionService: SessionService,
    private readonly proofOfWork: ProofOfWorkService,
    private readonly relay: UpstreamRelayService,
    private readonly assembler: CompletionAssemblerService,
  ) {}

  /**
   * Runs everything up to and including the commit point. Whatever this
   * throws is reported to the client as an error envelope; once it returns,
   * the response is committed. `signal` is the client's connection: once it
   * aborts, no further upstream work is started and the relay is cancelled.
   */
  async start(body: unknown, signal?: AbortSignal): Promise<CompletionAssembly> {
    const request = this.translator.parse(body);
    const conversation = this.translator.translate(request);

    const session = await this.sessionService.negotiate(signal);
    const proof = this.proofOfWork.solve(session.challengeSeed, session.challengeDifficulty);
    if (signal?.aborted) {
      throw new ClientClosedError();
    }

    this.logger.log(
      `Relaying ${request.messages.length} messages as ${conversation.messages.length} upstream ` +
        `(${this.translator.mergePolicy}, ${request.stream ? 'stream' : 'buffered'}` +
        `${proof.degraded ? ', degraded proof' : ''})`,
    );

    const handle = this.relay.open(conversation, session, proof.token, signal);
    return this.assembler.commit(handle, request.stream ? 'streaming' : 'buffered');
  }
}
