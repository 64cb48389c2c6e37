import { Inject, Injectable, Logger } from '@nestjs/common';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/gateway.config';
import { ProofToken } from '../../common/interfaces';
import { PROOF_CONSTANT } from './upstream.constants';
import { solveProofOfWork } from './proof-of-work';

@Injectable()
export class ProofOfWorkService {
  private readonly logger = new Logger(ProofOfWorkService.name);
  private solvedCount = 0;
  private degradedCount = 0;

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(PROOF_CONSTANT) private readonly constant: number,
  ) {}

  solve(seed: string, difficulty: string): ProofToken {
    const startTime = Date.now();
    const proof = solveProofOfWork({
      seed,
      difficulty,
      constant: this.constant,
      maxIterations: this.config.proofOfWork.maxIterations,
    });
    const elapsedMs = Date.now() - startTime;

    if (proof.degraded) {
      this.degradedCount++;
      this.logger.warn(
        `Proof of work not met after ${proof.attempts} attempts (difficulty ${difficulty}, ${elapsedMs}ms), ` +
          `sending degraded token (${this.degradedCount} degraded / ${this.solvedCount} solved so far)`,
      );
    } else {
      this.solvedCount++;
      this.logger.debug(`Proof of work met after ${proof.attempts} attempts (difficulty ${difficulty}, ${elapsedMs}ms)`);
    }

    return proof;
  }
}
