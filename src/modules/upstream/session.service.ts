import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/gateway.config';
import { SessionRequirements } from '../../common/interfaces';
import { ClientClosedError, UpstreamParseError, UpstreamSessionError } from '../../common/errors';
import { errorMessage, randomId } from '../../common/utils';
import { CHAT_REQUIREMENTS_PATH, UPSTREAM_HTTP, commonHeaders } from './upstream.constants';
import { ChatRequirementsDto } from './dto/chat-requirements.dto';
import { parseUpstreamJson } from './upstream-parse';

@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(UPSTREAM_HTTP) private readonly http: AxiosInstance,
  ) {}

  /**
   * Asks the backend what it needs before it will take a conversation
   * request. One round trip, never cached, never retried. Aborting `signal`
   * drops the round trip and rejects with ClientClosedError.
   */
  async negotiate(signal?: AbortSignal): Promise<SessionRequirements> {
    const deviceId = randomId();
    const { baseUrl, connectTimeoutMs } = this.config.upstream;

    let status: number;
    let body: string;
    try {
      const response = await this.http.post<string>(`${baseUrl}${CHAT_REQUIREMENTS_PATH}`, '{}', {
        headers: { ...commonHeaders(baseUrl), 'oai-device-id': deviceId },
        timeout: connectTimeoutMs,
        responseType: 'text',
        validateStatus: () => true,
        signal,
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      if (signal?.aborted) {
        throw new ClientClosedError();
      }
      if (axios.isAxiosError(error) && error.code) {
        this.logger.warn(`Chat requirements request failed (${error.code}): ${error.message}`);
      }
      throw new UpstreamSessionError(errorMessage(error));
    }

    if (status < 200 || status >= 300) {
      throw new UpstreamSessionError(`Invalid response code ${status}, ${body}`);
    }

    let requirements: ChatRequirementsDto;
    try {
      requirements = parseUpstreamJson(ChatRequirementsDto, body);
    } catch (error) {
      if (error instanceof UpstreamParseError) {
        this.logger.warn(`Chat requirements response rejected (${error.kind}): ${error.message}`);
        throw new UpstreamSessionError(`${error.message}, ${body}`);
      }
      throw error;
    }

    this.logger.debug(
      `Negotiated session: device ${deviceId}, difficulty ${requirements.proofofwork.difficulty}`,
    );

    return {
      deviceId,
      sessionToken: requirements.token,
      challengeSeed: requirements.proofofwork.seed,
      challengeDifficulty: requirements.proofofwork.difficulty,
    };
  }
}
