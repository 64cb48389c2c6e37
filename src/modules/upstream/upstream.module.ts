import { Module } from '@nestjs/common';
import { randomInt } from 'crypto';
import { PROOF_CONSTANT } from './upstream.constants';
import { PROOF_CONSTANT_RANGE } from './proof-of-work';
import { upstreamHttpProvider } from './upstream-http.provider';
import { SessionService } from './session.service';
import { ProofOfWorkService } from './proof-of-work.service';
import { UpstreamRelayService } from './upstream-relay.service';

@Module({
  providers: [
    upstreamHttpProvider,
    {
      // drawn once when the application boots, shared by every call
      provide: PROOF_CONSTANT,
      useFactory: () => randomInt(PROOF_CONSTANT_RANGE.min, PROOF_CONSTANT_RANGE.max),
    },
    SessionService,
    ProofOfWorkService,
    UpstreamRelayService,
  ],
  exports: [SessionService, ProofOfWorkService, UpstreamRelayService],
})
export class UpstreamModule {}
